import { Dialect } from '../../types/sql';
import { BaseDialectStrategy, type StrategyStep } from './base';

export class PostgreSqlStrategy extends BaseDialectStrategy {
  readonly target = Dialect.POSTGRESQL;

  protected steps(): StrategyStep[] {
    return [
      this.hints,
      this.quoting,
      this.outerJoins,
      this.rownum,
      this.limit,
      this.dual,
      this.functionCalls,
      this.dataTypes,
      this.views,
      this.triggers,
      this.returning,
    ];
  }
}
