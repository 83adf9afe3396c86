import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'url'
import { loadCheckerRegistry } from '../loadRegistry.js'

const ROOT_DIR = fileURLToPath(new URL('../../../', import.meta.url))

describe('loadCheckerRegistry', () => {
  it('builds the registry from a module relative to cwd', async () => {
    const result = await loadCheckerRegistry('tests/fixtures/checkers.ts', ROOT_DIR)

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.list().map(c => c.name)).toEqual([
        'basic_checker',
        'healthy_checker',
        'empty_failures',
        'broken_checker',
      ])
      expect(result.value.get('basic_checker')).toMatchObject({ severity: 'HIGH', cadence: 'HOURLY', tries: 1 })
    }
  })

  it('fails on duplicate registrations', async () => {
    const result = await loadCheckerRegistry('tests/fixtures/duplicateCheckers.ts', ROOT_DIR)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('CHECKER_DUPLICATE')
    }
  })

  it('fails when registerCheckers is not exported', async () => {
    const result = await loadCheckerRegistry('tests/fixtures/noRegister.ts', ROOT_DIR)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('REGISTRY_LOAD_FAILED')
      expect(result.error.message).toBe(
        'Failed to load checkers from tests/fixtures/noRegister.ts: registerCheckers is not exported'
      )
    }
  })

  it('fails when the module does not exist', async () => {
    const result = await loadCheckerRegistry('tests/fixtures/missing.ts', ROOT_DIR)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('REGISTRY_LOAD_FAILED')
    }
  })
})
