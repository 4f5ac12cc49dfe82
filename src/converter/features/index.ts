import type { FeatureConverter } from '../context';
import { CteConverter } from './cteConverter';
import { DatabaseLinkConverter } from './databaseLinkConverter';
import { DateArithmeticConverter } from './dateArithmeticConverter';
import { HierarchicalQueryConverter } from './hierarchicalQueryConverter';
import { IndexConverter } from './indexConverter';
import { MaterializedViewConverter } from './materializedViewConverter';
import { MergeConverter } from './mergeConverter';
import { PackageCallConverter } from './packageCallConverter';
import { PivotConverter } from './pivotConverter';
import { SequenceConverter } from './sequenceConverter';
import { SynonymConverter } from './synonymConverter';
import { UserDefinedTypeConverter } from './userDefinedTypeConverter';
import { WindowFunctionConverter } from './windowFunctionConverter';

export {
  CteConverter,
  DatabaseLinkConverter,
  DateArithmeticConverter,
  HierarchicalQueryConverter,
  IndexConverter,
  MaterializedViewConverter,
  MergeConverter,
  PackageCallConverter,
  PivotConverter,
  SequenceConverter,
  SynonymConverter,
  UserDefinedTypeConverter,
  WindowFunctionConverter,
};

/**
 * Feature converters in application order. MERGE runs first so the INSERT it
 * produces still sees synonym and sequence rewrites; date arithmetic runs last
 * so it reads the expressions the other converters leave behind.
 */
export const FEATURE_CONVERTERS: readonly FeatureConverter[] = Object.freeze([
  new MergeConverter(),
  new SynonymConverter(),
  new DatabaseLinkConverter(),
  new SequenceConverter(),
  new MaterializedViewConverter(),
  new IndexConverter(),
  new UserDefinedTypeConverter(),
  new PackageCallConverter(),
  new HierarchicalQueryConverter(),
  new CteConverter(),
  new PivotConverter(),
  new WindowFunctionConverter(),
  new DateArithmeticConverter(),
]);
