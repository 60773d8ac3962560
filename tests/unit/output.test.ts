import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import StreamZip from 'node-stream-zip'
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'

import { outputPaths, writeAggregatedCsv, writeConsolidatedCsv, writeOutputs } from '../../lib/output'
import { consolidatedRecord } from '../fixtures/builders'

let dataDir: string

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), 'output-test-'))
})

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true })
})

describe('writeConsolidatedCsv', () => {
  it('writes the fixed header and fills a missing category', async () => {
    const path = join(dataDir, 'consolidated.csv')

    await writeConsolidatedCsv([consolidatedRecord({ category: null, numericValue: 1000 })], path)

    await expect(readFile(path, 'utf8')).resolves.toBe(
      'CNPJ,RazaoSocial,RegistroANS,Modalidade,UF,Valor\n11444777000161,ACME,111,ND,SP,1000\n'
    )
  })

  it('quotes values containing the delimiter', async () => {
    const path = join(dataDir, 'consolidated.csv')

    await writeConsolidatedCsv([consolidatedRecord({ legalName: 'ACME, SAUDE', numericValue: 12.5 })], path)

    await expect(readFile(path, 'utf8')).resolves.toBe(
      'CNPJ,RazaoSocial,RegistroANS,Modalidade,UF,Valor\n' +
        '11444777000161,"ACME, SAUDE",111,MEDICINA DE GRUPO,SP,12.5\n'
    )
  })
})

describe('writeAggregatedCsv', () => {
  it('writes one row per statistic', async () => {
    const path = join(dataDir, 'aggregated.csv')

    await writeAggregatedCsv(
      [{ legalName: 'ACME', regionCode: 'SP', total: 600, mean: 200, stdDev: 100, count: 3 }],
      path
    )

    await expect(readFile(path, 'utf8')).resolves.toBe(
      'Razao_Social,UF,Total_Despesas,Media_Trimestral,Desvio_Padrao\nACME,SP,600,200,100\n'
    )
  })
})

describe('writeOutputs', () => {
  it('writes all three outputs without leaving temporary files', async () => {
    const paths = await writeOutputs(
      [consolidatedRecord({ numericValue: 1000 })],
      [{ legalName: 'ACME', regionCode: 'SP', total: 1000, mean: 1000, stdDev: 0, count: 1 }],
      dataDir
    )

    expect(paths).toEqual(outputPaths(dataDir))
    expect((await readdir(dataDir)).sort()).toEqual([
      'consolidado_despesas.csv',
      'consolidado_despesas.zip',
      'despesas_agregadas.csv',
    ])

    const zip = new StreamZip.async({ file: paths.consolidatedZip })
    try {
      const entries = Object.keys(await zip.entries())
      expect(entries).toEqual(['consolidado_despesas.csv'])

      const packed = await zip.entryData('consolidado_despesas.csv')
      expect(packed.toString('utf8')).toBe(await readFile(paths.consolidatedCsv, 'utf8'))
    } finally {
      await zip.close()
    }
  })

  it('leaves every previous output in place when one target cannot be replaced', async () => {
    const paths = outputPaths(dataDir)
    await writeFile(paths.consolidatedCsv, 'OLD CONSOLIDATED')
    await mkdir(paths.aggregatedCsv)

    await expect(
      writeOutputs(
        [consolidatedRecord({ numericValue: 1000 })],
        [{ legalName: 'ACME', regionCode: 'SP', total: 1000, mean: 1000, stdDev: 0, count: 1 }],
        dataDir
      )
    ).rejects.toThrow(`Cannot replace ${paths.aggregatedCsv}: not a regular file`)

    await expect(readFile(paths.consolidatedCsv, 'utf8')).resolves.toBe('OLD CONSOLIDATED')
    expect((await readdir(dataDir)).sort()).toEqual(['consolidado_despesas.csv', 'despesas_agregadas.csv'])
  })
})
