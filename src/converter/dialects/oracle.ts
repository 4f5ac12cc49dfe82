import { Dialect } from '../../types/sql';
import { BaseDialectStrategy, type StrategyStep } from './base';

export class OracleStrategy extends BaseDialectStrategy {
  readonly target = Dialect.ORACLE;

  protected steps(): StrategyStep[] {
    return [this.quoting, this.casts, this.limit, this.dual, this.functionCalls, this.dataTypes, this.returning];
  }
}
