import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { loadSlidesiftConfig, resolveConfigPath } from '../src/config.js'

const writeConfig = (raw: string) => {
  const root = mkdtempSync(join(tmpdir(), 'slidesift-config-'))
  const configDir = join(root, '.slidesift')
  mkdirSync(configDir, { recursive: true })
  const configPath = join(configDir, 'config.json')
  writeFileSync(configPath, raw, 'utf8')
  return { root, configPath }
}

const writeJsonConfig = (value: unknown) => writeConfig(JSON.stringify(value))

describe('config loading', () => {
  it('loads ~/.slidesift/config.json by default', () => {
    const { root, configPath } = writeJsonConfig({
      slides: { sceneThreshold: 0.3, similarityThreshold: 0.9, workers: 8 },
      ffmpeg: { path: ' /opt/ffmpeg/bin/ffmpeg ' },
      logging: { level: 'debug', format: 'json' },
    })

    const result = loadSlidesiftConfig({ env: { HOME: root } })
    expect(result.path).toBe(configPath)
    expect(result.config).toEqual({
      slides: { sceneThreshold: 0.3, similarityThreshold: 0.9, workers: 8 },
      ffmpeg: { path: '/opt/ffmpeg/bin/ffmpeg' },
      logging: { level: 'debug', format: 'json' },
    })
  })

  it('honours SLIDESIFT_CONFIG over HOME', () => {
    const { configPath } = writeJsonConfig({ slides: { workers: 2 } })
    expect(resolveConfigPath({ SLIDESIFT_CONFIG: configPath, HOME: '/nowhere' })).toBe(configPath)
    expect(loadSlidesiftConfig({ env: { SLIDESIFT_CONFIG: configPath } }).config).toEqual({
      slides: { workers: 2 },
    })
  })

  it('returns a null config when the file is missing', () => {
    const root = mkdtempSync(join(tmpdir(), 'slidesift-config-'))
    expect(loadSlidesiftConfig({ env: { HOME: root } })).toEqual({
      config: null,
      path: join(root, '.slidesift', 'config.json'),
    })
    expect(loadSlidesiftConfig({ env: {} })).toEqual({ config: null, path: null })
  })

  it('accepts JSON5 comments and trailing commas', () => {
    const { root } = writeConfig(`{
      // tuned for dense slide decks
      slides: { similarityThreshold: 0.95, },
    }`)
    expect(loadSlidesiftConfig({ env: { HOME: root } }).config).toEqual({
      slides: { similarityThreshold: 0.95 },
    })
  })

  it('rejects malformed files', () => {
    const { root, configPath } = writeConfig('{ slides: ')
    expect(() => loadSlidesiftConfig({ env: { HOME: root } })).toThrow(
      `Invalid JSON in config file ${configPath}`
    )
  })

  it('rejects a non-object top level', () => {
    const { root, configPath } = writeJsonConfig([1, 2])
    expect(() => loadSlidesiftConfig({ env: { HOME: root } })).toThrow(
      `Invalid config file ${configPath}: expected an object at the top level`
    )
  })

  it('validates slide settings', () => {
    const workers = writeJsonConfig({ slides: { workers: 32 } })
    expect(() => loadSlidesiftConfig({ env: { HOME: workers.root } })).toThrow(
      `Invalid config file ${workers.configPath}: "slides.workers" must be between 1 and 16.`
    )
    const fractional = writeJsonConfig({ slides: { workers: 1.5 } })
    expect(() => loadSlidesiftConfig({ env: { HOME: fractional.root } })).toThrow(
      '"slides.workers" must be an integer.'
    )
    const similarity = writeJsonConfig({ slides: { similarityThreshold: '0.9' } })
    expect(() => loadSlidesiftConfig({ env: { HOME: similarity.root } })).toThrow(
      '"slides.similarityThreshold" must be a number.'
    )
    const section = writeJsonConfig({ slides: 'fast' })
    expect(() => loadSlidesiftConfig({ env: { HOME: section.root } })).toThrow(
      '"slides" must be an object.'
    )
  })

  it('validates ffmpeg and logging sections', () => {
    const ffmpeg = writeJsonConfig({ ffmpeg: { path: '' } })
    expect(() => loadSlidesiftConfig({ env: { HOME: ffmpeg.root } })).toThrow(
      '"ffmpeg.path" must be a non-empty string.'
    )
    const level = writeJsonConfig({ logging: { level: 'trace' } })
    expect(() => loadSlidesiftConfig({ env: { HOME: level.root } })).toThrow(
      '"logging.level" must be one of debug, info, warn, error, silent.'
    )
    const format = writeJsonConfig({ logging: { format: 'xml' } })
    expect(() => loadSlidesiftConfig({ env: { HOME: format.root } })).toThrow(
      '"logging.format" must be "json" or "pretty".'
    )
  })
})
