import { describe, expect, it } from 'vitest';
import { DEFAULT_RULE_CONFIG, isRuleProfile, resolveRuleConfig } from '../../src/config/ruleConfig';
import { ConfigurationError } from '../../src/converter/errors';

describe('resolveRuleConfig', () => {
  it('fills defaults', () => {
    expect(DEFAULT_RULE_CONFIG.warnings.maxInClauseSize).toBe(100);
    expect(DEFAULT_RULE_CONFIG.ddl.convertTriggers).toBe(false);
    expect(DEFAULT_RULE_CONFIG.ddl.convertPartitions).toBe(false);
    expect(DEFAULT_RULE_CONFIG.function.convertNvl).toBe(true);
  });

  it('returns a frozen snapshot', () => {
    expect(Object.isFrozen(DEFAULT_RULE_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RULE_CONFIG.warnings)).toBe(true);
  });

  it('applies the strict profile', () => {
    expect(resolveRuleConfig('strict').warnings.maxInClauseSize).toBe(50);
  });

  it('applies the minimal profile', () => {
    const config = resolveRuleConfig('minimal');
    expect(config.syntax.convertMerge).toBe(false);
    expect(config.function.convertDecode).toBe(false);
    expect(config.function.convertNvl).toBe(true);
    expect(config.dataType.convertVarchar2).toBe(true);
  });

  it('merges overrides over a named profile', () => {
    const config = resolveRuleConfig({ profile: 'strict', warnings: { warnOnSelectStar: false } });
    expect(config.warnings.maxInClauseSize).toBe(50);
    expect(config.warnings.warnOnSelectStar).toBe(false);
  });

  it('rejects invalid values', () => {
    const resolve = () => resolveRuleConfig({ warnings: { maxInClauseSize: -1 } });
    expect(resolve).toThrow(ConfigurationError);
    expect(resolve).toThrow(/^Invalid rule configuration: warnings\.maxInClauseSize: /);
    try {
      resolve();
    } catch (error) {
      expect(error instanceof ConfigurationError && error.code).toBe('INVALID_RULE_CONFIG');
    }
  });
});

describe('isRuleProfile', () => {
  it('accepts only known profiles', () => {
    expect(isRuleProfile('minimal')).toBe(true);
    expect(isRuleProfile('lenient')).toBe(false);
  });
});
