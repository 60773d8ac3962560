/**
 * Pipeline configuration
 * Reads remote source URLs, network budgets and retrieval limits from the environment
 */

import { ValidationError } from '../errors'

export const DEFAULT_REGISTRY_DIRECTORY_URL =
  'https://dadosabertos.ans.gov.br/FTP/PDA/operadoras_de_plano_de_saude_ativas/'
export const DEFAULT_STATEMENTS_ROOT_URL =
  'https://dadosabertos.ans.gov.br/FTP/PDA/demonstracoes_contabeis/'
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

export interface PipelineConfig {
  registryDirectoryUrl: string
  statementsRootUrl: string
  /** Directory for extracted CSVs and pipeline outputs */
  dataDir: string
  listingTimeoutMs: number
  downloadTimeoutMs: number
  /** Most recent period directories to visit */
  maxPeriods: number
  /** Global budget of extracted files across all periods */
  maxFiles: number
  userAgent: string
}

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }

  const value = Number(raw.trim())
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got: ${raw}`, { name, raw })
  }
  return value
}

function readUrl(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name]?.trim()
  if (!raw) {
    return fallback
  }

  try {
    return new URL(raw).toString()
  } catch {
    throw new ValidationError(`${name} is not a valid URL: ${raw}`, { name, raw })
  }
}

/**
 * Get pipeline configuration from environment
 */
export function getPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    registryDirectoryUrl: readUrl(env, 'REGISTRY_DIRECTORY_URL', DEFAULT_REGISTRY_DIRECTORY_URL),
    statementsRootUrl: readUrl(env, 'STATEMENTS_ROOT_URL', DEFAULT_STATEMENTS_ROOT_URL),
    dataDir: env.DATA_DIR?.trim() || 'data',
    listingTimeoutMs: readPositiveInt(env, 'LISTING_TIMEOUT_MS', 30_000),
    downloadTimeoutMs: readPositiveInt(env, 'DOWNLOAD_TIMEOUT_MS', 60_000),
    maxPeriods: readPositiveInt(env, 'MAX_PERIODS', 3),
    maxFiles: readPositiveInt(env, 'MAX_FILES', 3),
    userAgent: env.HTTP_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
  }
}
