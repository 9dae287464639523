import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { SourceItem } from '../feedback/types'
import { DatasetCache } from './cache'

const savedAt = new Date('2024-04-01T10:00:00Z')
const hoursLater = (h: number) => new Date(savedAt.getTime() + h * 3_600_000)

const items: SourceItem[] = [
  { kind: 'csv', row: { text: 'Fine', rating: '4' } },
  { kind: 'google_play', reviewId: 'g1', content: 'Nice', score: 5, at: new Date('2024-03-30T00:00:00Z') }
]

describe('DatasetCache', () => {
  let dir = ''
  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'feedback-cache-'))
  })
  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('serves items while they are fresh', async () => {
    const cache = new DatasetCache(dir, 2)
    await cache.write(items, savedAt)
    const fresh = await cache.readFresh(hoursLater(1))
    expect(fresh?.ageHours).toBe(1)
    expect(fresh?.items).toEqual([items[0], { ...items[1], at: '2024-03-30T00:00:00.000Z' }])
  })

  it('stops serving fresh items after the TTL but keeps them for fallback', async () => {
    const cache = new DatasetCache(dir, 2)
    await cache.write(items, savedAt)
    expect(await cache.readFresh(hoursLater(3))).toBeNull()
    expect((await cache.read(hoursLater(3)))?.items).toHaveLength(2)
  })

  it('ignores a missing or damaged file', async () => {
    const cache = new DatasetCache(dir, 2)
    expect(await cache.read()).toBeNull()
    await fs.writeFile(cache.filePath, '{"savedAt": "yesterday"}')
    expect(await cache.read()).toBeNull()
    await fs.writeFile(cache.filePath, 'not json')
    expect(await cache.read()).toBeNull()
  })
})
