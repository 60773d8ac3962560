/**
 * Shared column mapping utilities
 * Maps drifting source header names onto the logical fields the pipeline reads
 */

/**
 * Trim and uppercase a source header
 */
export function normalizeHeader(header: string): string {
  return header.trim().toUpperCase()
}

export type RegistryField = 'registrationId' | 'taxpayerId' | 'legalName' | 'regionCode' | 'category'

/**
 * Candidate header fragments per registry field, most specific first.
 * The registry's header names change from year to year, so matching is by
 * exact name first and by substring second.
 */
export const REGISTRY_COLUMN_ALIASES: Record<RegistryField, readonly string[]> = {
  registrationId: ['REGISTRO_OPERADORA', 'REGISTRO_ANS', 'REG_ANS', 'REGISTRO'],
  taxpayerId: ['CNPJ'],
  legalName: ['RAZAO_SOCIAL', 'RAZAO'],
  regionCode: ['UF'],
  category: ['MODALIDADE'],
}

export const REQUIRED_REGISTRY_FIELDS: readonly RegistryField[] = [
  'registrationId',
  'taxpayerId',
  'legalName',
  'regionCode',
]

export type RegistryColumns = Record<RegistryField, string | null>

/**
 * Find the header that stands for a logical field
 * @returns The matching header, or null when no candidate matches
 */
export function resolveColumn(headers: readonly string[], aliases: readonly string[]): string | null {
  for (const alias of aliases) {
    if (headers.includes(alias)) return alias
  }

  for (const alias of aliases) {
    const match = headers.find((header) => header.includes(alias))
    if (match) return match
  }

  return null
}

/**
 * Resolve every registry field against the normalized headers once
 */
export function resolveRegistryColumns(headers: readonly string[]): RegistryColumns {
  return {
    registrationId: resolveColumn(headers, REGISTRY_COLUMN_ALIASES.registrationId),
    taxpayerId: resolveColumn(headers, REGISTRY_COLUMN_ALIASES.taxpayerId),
    legalName: resolveColumn(headers, REGISTRY_COLUMN_ALIASES.legalName),
    regionCode: resolveColumn(headers, REGISTRY_COLUMN_ALIASES.regionCode),
    category: resolveColumn(headers, REGISTRY_COLUMN_ALIASES.category),
  }
}

/**
 * Required registry fields that no header matched
 */
export function missingRegistryFields(columns: RegistryColumns): RegistryField[] {
  return REQUIRED_REGISTRY_FIELDS.filter((field) => columns[field] === null)
}

export type AccountingField = 'registrationId' | 'accountCode' | 'value' | 'period'

/**
 * Source column names of the accounting statements
 */
export const ACCOUNTING_COLUMN_RENAMES: Record<string, AccountingField> = {
  'REG_ANS': 'registrationId',
  'CD_CONTA_CONTABIL': 'accountCode',
  'VL_SALDO_FINAL': 'value',
  'DATA': 'period',
}

/**
 * Rename known accounting columns to their logical names, leaving the rest untouched
 */
export function renameAccountingColumn(header: string): string {
  return ACCOUNTING_COLUMN_RENAMES[header] ?? header
}
