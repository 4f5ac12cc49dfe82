import { convertDateFormat, isNumericFormat } from '../../mappings/dateFormats';
import { functionMappingsFor } from '../../mappings/functions';
import type { FunctionMappingRule, StepResult } from '../../types/sql';
import { escapeRegExp, replaceArg, rewriteFunctionCalls, swapFirstTwoArgs, type FunctionCall } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext } from '../context';
import { createWarning } from '../warnings';

/**
 * Table-driven function conversion for one dialect pair: renames, argument
 * swaps, CASE rewrites of conditional functions and date-format remapping.
 * Functions without a mapping pass through untouched.
 */
export class FunctionTransformer {
  transform(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const rules = functionMappingsFor(ctx.source, ctx.target).filter(
      rule => rule.rule === undefined || ctx.config.function[rule.rule],
    );
    const byName = new Map(rules.map(rule => [rule.sourceName.toUpperCase(), rule]));

    let sql = rewriteFunctionCalls(
      masked,
      rules.filter(rule => !rule.bare).map(rule => rule.sourceName),
      call => {
        const rule = byName.get(call.name.toUpperCase());
        if (!rule || !this.arityMatches(rule, call.args.length)) return undefined;
        const replaced = this.transformCall(rule, call, ctx, recorder);
        if (replaced !== undefined) this.record(rule, recorder);
        return replaced;
      },
    );

    for (const rule of rules.filter(candidate => candidate.bare)) {
      const pattern = new RegExp(`(?<![\\w.$"\`])${escapeRegExp(rule.sourceName)}(?![\\w$"\`]|\\s*\\()`, 'gi');
      sql = sql.replace(pattern, () => {
        this.record(rule, recorder);
        return rule.targetName;
      });
    }

    return recorder.result(sql);
  }

  private arityMatches(rule: FunctionMappingRule, count: number): boolean {
    if (rule.minArgs !== undefined && count < rule.minArgs) return false;
    if (rule.maxArgs !== undefined && count > rule.maxArgs) return false;
    return true;
  }

  private record(rule: FunctionMappingRule, recorder: StepRecorder): void {
    recorder.rule(`Function: ${rule.sourceName} → ${rule.targetName}`);
    if (rule.warning) {
      recorder.warn(createWarning('syntax-difference', `${rule.sourceName}: ${rule.warning}`, 'warning'));
    }
  }

  private transformCall(
    rule: FunctionMappingRule,
    call: FunctionCall,
    ctx: ConversionContext,
    recorder: StepRecorder,
  ): string | undefined {
    switch (rule.transform) {
      case 'rename':
        if (rule.targetBare) return rule.targetName;
        return `${rule.targetName}${call.gap}(${call.inner})`;
      case 'swap-first-two':
        return `${rule.targetName}${call.gap}(${swapFirstTwoArgs(call.inner)})`;
      case 'case-when':
        return this.toCase(rule.sourceName.toUpperCase(), call.args);
      case 'date-format':
        return this.convertFormatCall(rule, call, ctx, recorder);
    }
  }

  private toCase(name: string, args: string[]): string | undefined {
    if (name === 'NVL2') {
      const [value, whenSet, whenNull] = args;
      return `CASE WHEN ${value} IS NOT NULL THEN ${whenSet} ELSE ${whenNull} END`;
    }
    if (name === 'IF') {
      const [condition, whenTrue, whenFalse] = args;
      return `CASE WHEN ${condition} THEN ${whenTrue} ELSE ${whenFalse} END`;
    }
    if (name === 'DECODE') {
      const [expr, ...pairs] = args;
      const fallback = pairs.length % 2 === 1 ? pairs.pop() : undefined;
      const branches: Array<[string, string]> = [];
      for (let i = 0; i < pairs.length; i += 2) branches.push([pairs[i], pairs[i + 1]]);
      const elseClause = fallback !== undefined ? ` ELSE ${fallback}` : '';

      // DECODE matches NULL to NULL, a simple CASE never does
      if (branches.some(([search]) => /^NULL$/i.test(search))) {
        const whens = branches.map(([search, result]) =>
          /^NULL$/i.test(search) ? `WHEN ${expr} IS NULL THEN ${result}` : `WHEN ${expr} = ${search} THEN ${result}`,
        );
        return `CASE ${whens.join(' ')}${elseClause} END`;
      }
      const whens = branches.map(([search, result]) => `WHEN ${search} THEN ${result}`);
      return `CASE ${expr} ${whens.join(' ')}${elseClause} END`;
    }
    return undefined;
  }

  private convertFormatCall(
    rule: FunctionMappingRule,
    call: FunctionCall,
    ctx: ConversionContext,
    recorder: StepRecorder,
  ): string | undefined {
    const format = call.args[1];
    const content = format === undefined ? undefined : ctx.mask.literalValue(format);
    if (content === undefined) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          `${rule.sourceName} format argument is not a literal; format tokens were not remapped`,
          'warning',
        ),
      );
      return `${rule.targetName}${call.gap}(${call.inner})`;
    }
    if (isNumericFormat(content)) {
      recorder.warn(
        createWarning(
          'data-type-mismatch',
          `${rule.sourceName} with numeric format '${content}' was not converted`,
          'warning',
          'Use FORMAT() or a CAST for number formatting in the target database',
        ),
      );
      return undefined;
    }
    const literal = ctx.mask.addLiteral(convertDateFormat(content, ctx.source, ctx.target));
    return `${rule.targetName}${call.gap}(${replaceArg(call.inner, 1, literal)})`;
  }
}
