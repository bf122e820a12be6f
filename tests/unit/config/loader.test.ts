import path from 'node:path'
import { describe, it, expect } from 'vitest'
import { CONFIG_DIR, GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { loadConfig, normalizeLogLevel } from '../../../src/config/loader.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const projectDir = '/work/project'

describe('loadConfig', () => {
    it('returns defaults when nothing is configured', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), env: {}, projectDir })
        expect(config.model).toBe('gpt-4o-mini')
        expect(config.temperature).toBe(0.3)
        expect(config.logLevel).toBe('info')
        expect(config.apiKey).toBe('')
        expect(config.logDir).toBe(CONFIG_DIR)
        expect(config.backlogFile).toBe(path.join(projectDir, 'backlog.csv'))
        expect(config.baseURL).toBeUndefined()
    })

    it('reads environment variables', async () => {
        const config = await loadConfig({
            fs: new MockFileSystem(),
            projectDir,
            env: {
                OPENAI_API_KEY: 'test-key',
                BACKLOG_MODEL: 'gpt-4o',
                BACKLOG_LOG_DIR: '/var/log/bckl',
                BACKLOG_LOG_LEVEL: 'DEBUG',
                BACKLOG_FILE: 'notes/backlog.csv',
            },
        })
        expect(config.apiKey).toBe('test-key')
        expect(config.model).toBe('gpt-4o')
        expect(config.logDir).toBe('/var/log/bckl')
        expect(config.logLevel).toBe('debug')
        expect(config.backlogFile).toBe(path.join(projectDir, 'notes/backlog.csv'))
    })

    it('expands ~ in the log directory', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir, env: { BACKLOG_LOG_DIR: '~/logs' } })
        expect(config.logDir).toBe(path.join(path.dirname(CONFIG_DIR), 'logs'))
    })

    it('CLI flags override env vars', async () => {
        const config = await loadConfig({
            fs: new MockFileSystem(),
            projectDir,
            env: { BACKLOG_MODEL: 'gpt-4o' },
            cliFlags: { model: 'gpt-4.1-mini' },
        })
        expect(config.model).toBe('gpt-4.1-mini')
    })

    it('env vars override the global config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ model: 'from-file', temperature: 0.7 }))
        const config = await loadConfig({ fs, projectDir, env: { BACKLOG_MODEL: 'from-env' } })
        expect(config.model).toBe('from-env')
        expect(config.temperature).toBe(0.7)
    })

    it('ignores an invalid global config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ temperature: 9 }))
        const config = await loadConfig({ fs, projectDir, env: {} })
        expect(config.temperature).toBe(0.3)
    })

    it('falls back to the default level for unknown names', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir, env: { BACKLOG_LOG_LEVEL: 'LOUD' } })
        expect(config.logLevel).toBe('info')
    })
})

describe('normalizeLogLevel', () => {
    it('maps stdlib-style names onto pino levels', () => {
        expect(normalizeLogLevel('INFO')).toBe('info')
        expect(normalizeLogLevel('WARNING')).toBe('warn')
        expect(normalizeLogLevel('CRITICAL')).toBe('fatal')
        expect(normalizeLogLevel(' error ')).toBe('error')
    })

    it('returns undefined for empty or unknown input', () => {
        expect(normalizeLogLevel(undefined)).toBeUndefined()
        expect(normalizeLogLevel('')).toBeUndefined()
        expect(normalizeLogLevel('verbose')).toBeUndefined()
    })
})
