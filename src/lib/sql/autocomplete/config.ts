import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'
import {
  DEFAULT_LEFT_SIDE_WINDOW,
  DEFAULT_OPERATOR_REACH,
  DEFAULT_QUALIFIED_NAME_WINDOW,
  DEFAULT_REFERENCE_WINDOW,
} from './qualified-name'
import { DEFAULT_SUBQUERY_WINDOW } from './subquery'
import { DEFAULT_MAX_NESTING_DEPTH } from './parser'
import type { SubqueryStrategy } from './types'

export interface ResolverConfig {
  /** Tokens read backward for a dotted qualifier */
  qualifiedNameWindow: number
  /** Tokens read backward by referenceBeforeDot */
  referenceWindow: number
  /** Tokens read backward for the left side of a comparison */
  leftSideWindow: number
  /** How far back the comparison operator may sit */
  leftSideOperatorReach: number
  subqueryWindow: number
  /** Tokens read backward to find the clause keyword */
  clauseScanWindow: number
  batchSeparator: string
  subqueryStrategy: SubqueryStrategy
  /** Merge libpg-query tables when the module is loaded */
  precise: boolean
  /** Subqueries nested deeper than this are left unparsed */
  maxNestingDepth: number
}

export const DEFAULT_RESOLVER_CONFIG: Readonly<ResolverConfig> = {
  qualifiedNameWindow: DEFAULT_QUALIFIED_NAME_WINDOW,
  referenceWindow: DEFAULT_REFERENCE_WINDOW,
  leftSideWindow: DEFAULT_LEFT_SIDE_WINDOW,
  leftSideOperatorReach: DEFAULT_OPERATOR_REACH,
  subqueryWindow: DEFAULT_SUBQUERY_WINDOW,
  clauseScanWindow: 200,
  batchSeparator: 'GO',
  subqueryStrategy: 'parse',
  precise: true,
  maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH,
}

const KNOWN_KEYS = new Set([
  'qualified_name_window',
  'reference_window',
  'left_side_window',
  'left_side_operator_reach',
  'subquery_window',
  'clause_scan_window',
  'batch_separator',
  'subquery_strategy',
  'precise',
  'max_nesting_depth',
])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge per-call overrides over the defaults. Undefined overrides are ignored.
 */
export function resolveConfig(overrides: Partial<ResolverConfig> = {}): ResolverConfig {
  const config: ResolverConfig = { ...DEFAULT_RESOLVER_CONFIG }
  if (overrides.qualifiedNameWindow !== undefined) config.qualifiedNameWindow = overrides.qualifiedNameWindow
  if (overrides.referenceWindow !== undefined) config.referenceWindow = overrides.referenceWindow
  if (overrides.leftSideWindow !== undefined) config.leftSideWindow = overrides.leftSideWindow
  if (overrides.leftSideOperatorReach !== undefined) config.leftSideOperatorReach = overrides.leftSideOperatorReach
  if (overrides.subqueryWindow !== undefined) config.subqueryWindow = overrides.subqueryWindow
  if (overrides.clauseScanWindow !== undefined) config.clauseScanWindow = overrides.clauseScanWindow
  if (overrides.batchSeparator !== undefined) config.batchSeparator = overrides.batchSeparator
  if (overrides.subqueryStrategy !== undefined) config.subqueryStrategy = overrides.subqueryStrategy
  if (overrides.precise !== undefined) config.precise = overrides.precise
  if (overrides.maxNestingDepth !== undefined) config.maxNestingDepth = overrides.maxNestingDepth
  return config
}

function readWindow(section: Record<string, unknown>, key: string): number | undefined {
  const value = section[key]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`resolver.${key} must be a positive integer`)
  }
  return value
}

/**
 * Parse the `[resolver]` table of a TOML document. A document without one
 * yields the defaults.
 */
export function parseResolverConfig(content: string): ResolverConfig {
  const parsed = parse(content)
  const section = parsed.resolver
  if (section === undefined) return resolveConfig()
  if (!isRecord(section)) {
    throw new Error('resolver must be a table')
  }

  for (const key of Object.keys(section)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Unknown resolver option: ${key}`)
    }
  }

  let batchSeparator: string | undefined = undefined
  if (section.batch_separator !== undefined) {
    if (typeof section.batch_separator !== 'string' || !/^[A-Za-z_][A-Za-z0-9_]*$/.test(section.batch_separator)) {
      throw new Error('resolver.batch_separator must be a single word')
    }
    batchSeparator = section.batch_separator
  }

  let subqueryStrategy: SubqueryStrategy | undefined = undefined
  const strategy = section.subquery_strategy
  if (strategy !== undefined) {
    if (strategy !== 'parse' && strategy !== 'scan') {
      throw new Error('resolver.subquery_strategy must be "parse" or "scan"')
    }
    subqueryStrategy = strategy
  }

  let precise: boolean | undefined = undefined
  if (section.precise !== undefined) {
    if (typeof section.precise !== 'boolean') {
      throw new Error('resolver.precise must be a boolean')
    }
    precise = section.precise
  }

  return resolveConfig({
    qualifiedNameWindow: readWindow(section, 'qualified_name_window'),
    referenceWindow: readWindow(section, 'reference_window'),
    leftSideWindow: readWindow(section, 'left_side_window'),
    leftSideOperatorReach: readWindow(section, 'left_side_operator_reach'),
    subqueryWindow: readWindow(section, 'subquery_window'),
    clauseScanWindow: readWindow(section, 'clause_scan_window'),
    batchSeparator,
    subqueryStrategy,
    precise,
    maxNestingDepth: readWindow(section, 'max_nesting_depth'),
  })
}

export async function loadResolverConfig(configPath: string): Promise<ResolverConfig> {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }
  const content = readFileSync(configPath, 'utf-8')
  return parseResolverConfig(content)
}
