import path from 'path'
import { DEFAULT_CONCURRENCY, loadConfig, parsePositiveInt } from '../src/config'
import { ConfigError } from '../src/errors'

describe('config', () => {
  describe('loadConfig', () => {
    it('uses defaults when nothing is set', () => {
      expect(loadConfig({})).toEqual({
        debug: false,
        concurrency: DEFAULT_CONCURRENCY,
        includeDirs: [],
      })
    })

    it('treats empty variables as unset', () => {
      expect(
        loadConfig({ C_HEADER_INVENTORY_DEBUG: '', C_HEADER_INVENTORY_CONCURRENCY: '' }),
      ).toEqual({ debug: false, concurrency: 8, includeDirs: [] })
    })

    it('parses every variable', () => {
      const config = loadConfig({
        C_HEADER_INVENTORY_DEBUG: 'true',
        C_HEADER_INVENTORY_CONCURRENCY: '4',
        C_HEADER_INVENTORY_INCLUDE_PATH: ['/opt/include', '', 'vendor'].join(path.delimiter),
      })
      expect(config).toEqual({ debug: true, concurrency: 4, includeDirs: ['/opt/include', 'vendor'] })
    })

    it('accepts 1 and 0 for the debug flag', () => {
      expect(loadConfig({ C_HEADER_INVENTORY_DEBUG: '1' }).debug).toBe(true)
      expect(loadConfig({ C_HEADER_INVENTORY_DEBUG: '0' }).debug).toBe(false)
    })

    it.each(['abc', '0', '-2', '1.5'])('rejects concurrency %j', (value) => {
      expect(() => loadConfig({ C_HEADER_INVENTORY_CONCURRENCY: value })).toThrow(
        `C_HEADER_INVENTORY_CONCURRENCY must be a positive integer, got "${value}"`,
      )
    })

    it('rejects an unknown debug value with a ConfigError', () => {
      let caught: unknown
      try {
        loadConfig({ C_HEADER_INVENTORY_DEBUG: 'yes' })
      } catch (error) {
        caught = error
      }
      expect(caught).toBeInstanceOf(ConfigError)
      expect(caught).toMatchObject({
        code: 'ConfigError',
        message: 'C_HEADER_INVENTORY_DEBUG must be one of 0, 1, true, false, got "yes"',
        context: { variable: 'C_HEADER_INVENTORY_DEBUG', value: 'yes' },
      })
    })
  })

  describe('parsePositiveInt', () => {
    it('parses a positive integer', () => {
      expect(parsePositiveInt('16', 'concurrency')).toBe(16)
    })

    it('names the setting in the error', () => {
      expect(() => parsePositiveInt('many', 'concurrency')).toThrow(
        'concurrency must be a positive integer, got "many"',
      )
    })
  })
})
