/**
 * Configuration Loader for ftl-check
 * Loads and validates .ftl-check.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { CheckConfig, RuleState, Severity } from './types.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.ftl-check.json';

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/**
 * Create default configuration with all rules enabled.
 * Every known rule is 'on' at its own default severity.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  const severity: Record<string, Severity> = {};

  for (const rule of VALIDATION_RULES) {
    rules[rule.code] = 'on';
    severity[rule.code] = rule.severity;
  }

  return { rules, severity };
}

// ============================================================
// VALIDATION
// ============================================================

function isRuleState(value: unknown): value is RuleState {
  return value === 'on' || value === 'off' || value === 'warn';
}

function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read one section of the configuration, checking every value and every
 * rule code. An absent section yields an empty record.
 */
function readSection<T extends string>(
  config: Record<string, unknown>,
  field: 'rules' | 'severity',
  guard: (value: unknown) => value is T,
  allowed: string
): Record<string, T> {
  const section = config[field];
  if (section === undefined) return {};
  if (!isPlainObject(section)) {
    throw new Error(`Invalid configuration: ${field} must be an object`);
  }

  const knownRules = new Set(VALIDATION_RULES.map((r) => r.code));
  const result: Record<string, T> = {};
  for (const [code, value] of Object.entries(section)) {
    if (!knownRules.has(code)) {
      throw new Error(`Invalid configuration: unknown rule ${code}`);
    }
    if (!guard(value)) {
      const label = field === 'rules' ? 'state' : 'severity';
      throw new Error(
        `Invalid configuration: rule ${code} has invalid ${label} "${String(value)}" (must be ${allowed})`
      );
    }
    result[code] = value;
  }
  return result;
}

/**
 * Validate a parsed configuration object and merge it over the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}" on any invalid value
 */
export function parseConfig(data: unknown): CheckConfig {
  if (!isPlainObject(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  const rules = readSection(data, 'rules', isRuleState, "'on', 'off', or 'warn'");
  const severity = readSection(
    data,
    'severity',
    isSeverity,
    "'error', 'warning', or 'info'"
  );

  const defaults = createDefaultConfig();
  return {
    rules: { ...defaults.rules, ...rules },
    severity: { ...defaults.severity, ...severity },
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .ftl-check.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CheckConfig object, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is
 *   unreadable, is not valid JSON, or names an unknown rule
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData);
}
