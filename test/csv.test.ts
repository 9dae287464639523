import { describe, expect, it } from 'vitest'
import { csvItems, loadCsvFromText, sampleCsv } from '../src/sources/csvSource'

const sample = `id,text,rating
r1,Love it,5
r2,"Slow, but works",3
r3,"Said ""meh""",2
`

describe('CSV loader', () => {
  it('parses quoted cells', async () => {
    const tbl = await loadCsvFromText(sample)
    expect(tbl.totalRows).toBe(3)
    expect(tbl.columns).toEqual(['id', 'text', 'rating'])
    expect(tbl.rows[1].text).toBe('Slow, but works')
    expect(tbl.rows[2].text).toBe('Said "meh"')
  })

  it('strips a byte order mark', async () => {
    const tbl = await loadCsvFromText('\uFEFFtext,rating\nHello,4\n')
    expect(tbl.columns).toEqual(['text', 'rating'])
  })

  it('truncates to maxRows', async () => {
    const tbl = await loadCsvFromText(sample, 2)
    expect(tbl).toMatchObject({ totalRows: 3, truncated: true })
    expect(tbl.rows).toHaveLength(2)
  })

  it('wraps rows as csv items', async () => {
    const items = csvItems(await loadCsvFromText(sample, 1))
    expect(items).toEqual([{ kind: 'csv', row: { id: 'r1', text: 'Love it', rating: '5' } }])
  })
})

describe('sampleCsv', () => {
  it('dates rows relative to now', async () => {
    const text = sampleCsv(new Date('2024-06-10T08:00:00Z'))
    const lines = text.split('\n')
    expect(lines[0]).toBe('id,text,rating,date,author')
    expect(lines[1]).toBe('s0,The interface is clean. Would love better search.,4,2024-06-09,Respondent 1')
    expect((await loadCsvFromText(text)).totalRows).toBe(15)
  })
})
