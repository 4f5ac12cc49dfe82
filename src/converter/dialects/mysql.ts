import { Dialect } from '../../types/sql';
import { BaseDialectStrategy, type StrategyStep } from './base';

export class MySqlStrategy extends BaseDialectStrategy {
  readonly target = Dialect.MYSQL;

  protected steps(): StrategyStep[] {
    return [
      this.hints,
      this.quoting,
      this.casts,
      this.outerJoins,
      this.rownum,
      this.functionCalls,
      this.dataTypes,
      this.views,
      this.triggers,
      this.returning,
      this.concat,
      this.nullOrdering,
    ];
  }
}
