import { z } from 'zod';
import rawDataTypeMappings from './dataTypeMappings.json';
import type { DataTypeMapping, Dialect } from '../types/sql';

const DialectSchema = z.enum(['oracle', 'mysql', 'postgresql']);

const DataTypeMappingSchema = z.object({
  source: DialectSchema,
  target: DialectSchema,
  sourceType: z.string().min(1),
  targetType: z.string().min(1),
  keepPrecision: z.boolean(),
  defaultPrecision: z.string().optional(),
  warning: z.string().optional(),
  rule: z
    .enum([
      'convertVarchar2',
      'convertNumber',
      'convertClob',
      'convertBlob',
      'convertDate',
      'convertBoolean',
      'convertRaw',
      'convertFloat',
    ])
    .optional(),
});

export const dataTypeMappings: readonly DataTypeMapping[] = Object.freeze(
  z.array(DataTypeMappingSchema).parse(rawDataTypeMappings).map(mapping => Object.freeze(mapping)),
);

const mappingKey = (source: Dialect, target: Dialect, type: string) =>
  `${source}:${target}:${type.toUpperCase().replace(/\s+/g, ' ')}`;

const mappingIndex = new Map<string, DataTypeMapping>(
  dataTypeMappings.map(mapping => [mappingKey(mapping.source, mapping.target, mapping.sourceType), mapping]),
);

export function findDataTypeMapping(source: Dialect, target: Dialect, type: string): DataTypeMapping | undefined {
  return mappingIndex.get(mappingKey(source, target, type));
}

/** Mappings for one dialect pair; multi-word and longer names first so `LONG RAW` wins over `LONG`. */
export function dataTypeMappingsFor(source: Dialect, target: Dialect): DataTypeMapping[] {
  return dataTypeMappings
    .filter(mapping => mapping.source === source && mapping.target === target)
    .sort((a, b) => b.sourceType.length - a.sourceType.length);
}
