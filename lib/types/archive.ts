/**
 * Types for archive retrieval
 */

/**
 * A data file extracted from a remote archive
 */
export interface RetrievedFile {
  /** Period directory name (e.g. "2024") */
  period: string

  archiveUrl: string

  /** Member name inside the archive */
  entryName: string

  /** Where the member was extracted */
  localPath: string

  /** Uncompressed size in bytes */
  sizeBytes: number
}
