import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'

import { enrichRecord, transformFile, transformRows } from '../../lib/transform'
import {
  INVALID_TAXPAYER_ID,
  latin1Csv,
  registryEntry,
  registryMap,
  VALID_TAXPAYER_ID,
} from '../fixtures/builders'

const HEADERS = ['DATA', 'REG_ANS', 'CD_CONTA_CONTABIL', 'VL_SALDO_FINAL']

const registry = registryMap(
  registryEntry(),
  registryEntry({
    registrationId: '222',
    taxpayerId: INVALID_TAXPAYER_ID,
    legalName: 'BETA',
    regionCode: 'RJ',
    category: null,
  })
)

function row(registrationId: string, value: string) {
  return { DATA: '2024-01-01', REG_ANS: registrationId, CD_CONTA_CONTABIL: '41', VL_SALDO_FINAL: value }
}

describe('enrichRecord', () => {
  it('joins on the trimmed registration id and checks the taxpayer id', () => {
    const raw = { registrationId: ' 111 ', accountCode: '41', rawValue: '1.234,56', period: null }

    expect(enrichRecord(raw, registry)).toEqual({
      raw,
      registry: registryEntry(),
      numericValue: 1234.56,
      taxpayerIdValid: true,
    })
  })

  it('marks unmatched records as not valid', () => {
    const raw = { registrationId: '999', accountCode: null, rawValue: 'abc', period: null }

    expect(enrichRecord(raw, registry)).toEqual({
      raw,
      registry: null,
      numericValue: 0,
      taxpayerIdValid: false,
    })
  })
})

describe('transformRows', () => {
  it('drops unmatched rows, then rows with a value that is not strictly positive', () => {
    const { records, stats } = transformRows(
      HEADERS,
      [
        row('111', '1.000,00'),
        row('111', '0,00'),
        row('111', '-50,00'),
        row('999', '10,00'),
        row('222', 'abc'),
        row(' 222 ', '2.500,50'),
      ],
      registry,
      '1T2024.csv'
    )

    expect(records).toEqual([
      {
        taxpayerId: VALID_TAXPAYER_ID,
        legalName: 'ACME',
        registrationId: '111',
        category: 'MEDICINA DE GRUPO',
        regionCode: 'SP',
        numericValue: 1000,
        taxpayerIdValid: true,
      },
      {
        taxpayerId: INVALID_TAXPAYER_ID,
        legalName: 'BETA',
        registrationId: '222',
        category: null,
        regionCode: 'RJ',
        numericValue: 2500.5,
        taxpayerIdValid: false,
      },
    ])
    expect(stats).toEqual({
      file: '1T2024.csv',
      rowsRead: 6,
      unmatched: 1,
      nonPositive: 3,
      unparseableValues: 1,
      invalidTaxpayerIds: 1,
      emitted: 2,
    })
  })

  it('skips a file without a value column', () => {
    const { records, stats } = transformRows(['REG_ANS', 'DESCRICAO'], [{ REG_ANS: '111', DESCRICAO: 'x' }], registry)

    expect(records).toEqual([])
    expect(stats.skipped).toBe('no-value-column')
    expect(stats.rowsRead).toBe(0)
  })

  it('skips a file with a value column but no registration column', () => {
    const { stats } = transformRows(['VL_SALDO_FINAL'], [{ VL_SALDO_FINAL: '1,00' }], registry)

    expect(stats.skipped).toBe('parse-failure')
    expect(console.warn).toHaveBeenCalledTimes(1)
  })
})

describe('transformFile', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transform-test-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads a Latin-1 semicolon-delimited statement', async () => {
    const path = join(dir, '1T2024.csv')
    await writeFile(
      path,
      latin1Csv([
        '"DATA";"REG_ANS";"CD_CONTA_CONTABIL";"DESCRICAO";"VL_SALDO_INICIAL";"VL_SALDO_FINAL"',
        '"2024-01-01";"111";"41";"EVENTOS CONHECIDOS OU AVISADOS DE ASSISTÊNCIA";"0,00";"1.500,25"',
        '"2024-01-01";"999";"41";"EVENTOS";"0,00";"3,00"',
      ])
    )

    const { records, stats } = await transformFile(path, registry)

    expect(records.map((record) => [record.registrationId, record.numericValue])).toEqual([['111', 1500.25]])
    expect(stats.file).toBe('1T2024.csv')
    expect(stats.unmatched).toBe(1)
  })

  it('returns no records for a file that cannot be read', async () => {
    const { records, stats } = await transformFile(join(dir, 'missing.csv'), registry)

    expect(records).toEqual([])
    expect(stats).toEqual({
      file: 'missing.csv',
      rowsRead: 0,
      unmatched: 0,
      nonPositive: 0,
      unparseableValues: 0,
      invalidTaxpayerIds: 0,
      emitted: 0,
      skipped: 'parse-failure',
    })
  })
})
