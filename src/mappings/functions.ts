import { z } from 'zod';
import rawFunctionMappings from './functionMappings.json';
import type { Dialect, FunctionMappingRule } from '../types/sql';

const DialectSchema = z.enum(['oracle', 'mysql', 'postgresql']);

const FunctionMappingSchema = z.object({
  source: DialectSchema,
  target: DialectSchema,
  sourceName: z.string().min(1),
  targetName: z.string().min(1),
  transform: z.enum(['rename', 'swap-first-two', 'case-when', 'date-format']),
  bare: z.boolean().default(false),
  targetBare: z.boolean().default(false),
  minArgs: z.number().int().nonnegative().optional(),
  maxArgs: z.number().int().nonnegative().optional(),
  warning: z.string().optional(),
  rule: z
    .enum([
      'convertNvl',
      'convertNvl2',
      'convertDecode',
      'convertDateFunctions',
      'convertStringFunctions',
      'convertAggregateFunctions',
      'convertAnalyticFunctions',
    ])
    .optional(),
});

export const functionMappings: readonly FunctionMappingRule[] = Object.freeze(
  z.array(FunctionMappingSchema).parse(rawFunctionMappings).map(rule => Object.freeze(rule)),
);

const mappingKey = (source: Dialect, target: Dialect, name: string) =>
  `${source}:${target}:${name.toUpperCase()}`;

const mappingIndex = new Map<string, FunctionMappingRule>(
  functionMappings.map(rule => [mappingKey(rule.source, rule.target, rule.sourceName), rule]),
);

export function findFunctionMapping(
  source: Dialect,
  target: Dialect,
  name: string,
): FunctionMappingRule | undefined {
  return mappingIndex.get(mappingKey(source, target, name));
}

/** All rules for one dialect pair, longest source name first. */
export function functionMappingsFor(source: Dialect, target: Dialect): FunctionMappingRule[] {
  return functionMappings
    .filter(rule => rule.source === source && rule.target === target)
    .sort((a, b) => b.sourceName.length - a.sourceName.length);
}
