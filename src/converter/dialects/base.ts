import type { Dialect, StepResult } from '../../types/sql';
import { StepRecorder, type ConversionContext } from '../context';
import { DDLTransformer } from '../transformers/ddlTransformer';
import { DMLTransformer } from '../transformers/dmlTransformer';
import { FunctionTransformer } from '../transformers/functionTransformer';
import { OptimizationTransformer } from '../transformers/optimizationTransformer';

export type StrategyStep = (text: string, ctx: ConversionContext, recorder: StepRecorder) => string;

export interface DialectStrategy {
  readonly target: Dialect;
  /** Rewrite functions, types and operators of masked text for this target. */
  convert(masked: string, ctx: ConversionContext): StepResult;
}

/** Fold a transformer's own step result into the running recorder. */
function absorb(result: StepResult, recorder: StepRecorder): string {
  result.warnings.forEach(warning => recorder.warn(warning));
  result.appliedRules.forEach(rule => recorder.rule(rule));
  return result.sql;
}

export abstract class BaseDialectStrategy implements DialectStrategy {
  abstract readonly target: Dialect;

  protected readonly functions = new FunctionTransformer();
  protected readonly ddl = new DDLTransformer();
  protected readonly dml = new DMLTransformer();
  protected readonly optimization = new OptimizationTransformer();

  /** Ordered rewrite steps for the target. */
  protected abstract steps(): StrategyStep[];

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = masked;
    for (const step of this.steps()) {
      sql = step(sql, ctx, recorder);
    }
    return recorder.result(sql);
  }

  protected hints: StrategyStep = (text, ctx, recorder) => this.optimization.removeHints(text, ctx, recorder);
  protected quoting: StrategyStep = (text, ctx, recorder) => this.dml.transformQuoting(text, ctx, recorder);
  protected casts: StrategyStep = (text, ctx, recorder) => this.dml.transformCasts(text, ctx, recorder);
  protected outerJoins: StrategyStep = (text, ctx, recorder) => this.dml.transformOuterJoin(text, ctx, recorder);
  protected rownum: StrategyStep = (text, ctx, recorder) => this.dml.transformRownum(text, ctx, recorder);
  protected limit: StrategyStep = (text, ctx, recorder) => this.dml.transformLimit(text, ctx, recorder);
  protected dual: StrategyStep = (text, ctx, recorder) => this.dml.transformDual(text, ctx, recorder);
  protected returning: StrategyStep = (text, ctx, recorder) => this.dml.transformReturning(text, ctx, recorder);
  protected concat: StrategyStep = (text, ctx, recorder) => this.dml.transformConcat(text, ctx, recorder);
  protected nullOrdering: StrategyStep = (text, ctx, recorder) => this.dml.transformNullOrdering(text, ctx, recorder);
  protected functionCalls: StrategyStep = (text, ctx, recorder) => absorb(this.functions.transform(text, ctx), recorder);
  protected dataTypes: StrategyStep = (text, ctx, recorder) => absorb(this.ddl.transformDataTypes(text, ctx), recorder);
  protected views: StrategyStep = (text, ctx, recorder) => absorb(this.ddl.transformViews(text, ctx), recorder);
  protected triggers: StrategyStep = (text, ctx, recorder) => absorb(this.ddl.transformTriggers(text, ctx), recorder);
}
