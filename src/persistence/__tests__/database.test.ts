/**
 * Tests for DatabaseWrapper, the migration runner and DatabaseService.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DatabaseWrapper, createDatabaseService } from '../database.js'
import { MIGRATIONS, runMigrations } from '../migrations/index.js'
import type { Migration } from '../migrations/index.js'

const dirs: string[] = []

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })))
})

describe('DatabaseWrapper', () => {
  it('throws when the database is used before open()', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    expect(wrapper.isOpen).toBe(false)
    expect(() => wrapper.db).toThrow('DatabaseWrapper: database is not open. Call open() first.')
  })

  it('opens and closes idempotently with foreign keys on', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()
    wrapper.open()
    expect(wrapper.db.pragma('foreign_keys', { simple: true })).toBe(1)
    wrapper.close()
    wrapper.close()
    expect(wrapper.isOpen).toBe(false)
  })
})

describe('runMigrations', () => {
  it('applies pending migrations once', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()

    expect(runMigrations(wrapper.db)).toEqual(MIGRATIONS.map((m) => m.version))
    expect(runMigrations(wrapper.db)).toEqual([])

    const tables = wrapper.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name LIKE 'rebase_%' ORDER BY name")
      .pluck()
      .all()
    expect(tables).toEqual(['rebase_run_log', 'rebase_runs'])
    wrapper.close()
  })

  it('rolls back a migration that throws', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()
    const broken: Migration = {
      version: 1,
      name: 'broken',
      up(db) {
        db.exec('CREATE TABLE half_done (id INTEGER)')
        throw new Error('migration bug')
      },
    }

    expect(() => runMigrations(wrapper.db, [broken])).toThrow('migration bug')
    const count = wrapper.db.prepare('SELECT COUNT(*) FROM schema_migrations').pluck().get()
    expect(count).toBe(0)
    const table = wrapper.db.prepare("SELECT name FROM sqlite_master WHERE name = 'half_done'").get()
    expect(table).toBeUndefined()
    wrapper.close()
  })
})

describe('DatabaseService', () => {
  it('creates the parent directory of a file database', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'rebase-pilot-db-'))
    dirs.push(dir)
    const path = join(dir, 'nested', 'runs.db')
    const service = createDatabaseService(path)

    await service.initialize()
    expect(service.isOpen).toBe(true)
    expect(existsSync(path)).toBe(true)
    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })
})
