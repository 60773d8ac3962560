/**
 * Operator registry types
 */

/**
 * One operator from the registry file
 */
export interface RegistryEntry {
  /** Operator registration number, the join key for accounting records */
  registrationId: string

  /** 14-digit taxpayer id as published (punctuation preserved) */
  taxpayerId: string

  legalName: string

  /** Two-letter state code */
  regionCode: string

  /** Operator modality; null when the registry has no such column */
  category: string | null
}

/**
 * Registry lookup, keyed by trimmed registration id
 */
export type RegistryMap = ReadonlyMap<string, RegistryEntry>
