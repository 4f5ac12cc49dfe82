import type { ConversionContext, StepRecorder } from '../context';
import { createWarning } from '../warnings';

export class OptimizationTransformer {
  /** Oracle optimizer hints mean nothing to other engines. */
  removeHints(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle' || !ctx.config.syntax.handleOracleHints) return text;
    const removed: string[] = [];
    const out = text.replace(/\/\*\+([\s\S]*?)\*\/[ \t]?/g, (_match, body: string) => {
      removed.push(body.trim());
      return '';
    });
    if (removed.length > 0) {
      recorder.rule('Optimizer hints removed');
      recorder.warn(
        createWarning(
          'performance',
          `Optimizer hints removed: ${removed.join(', ')}`,
          'info',
          ctx.target === 'mysql'
            ? 'Use MySQL index hints (USE INDEX / FORCE INDEX) where the plan matters'
            : 'Tune with indexes and statistics; PostgreSQL has no optimizer hints',
        ),
      );
    }
    return out;
  }
}
