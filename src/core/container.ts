import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { ExtractionCache } from '../backlog/cache.js'
import { ExtractionClient } from '../backlog/extraction-client.js'
import type { ResolvedConfig } from '../config/schema.js'
import { createLLMClient } from '../llm/client.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger, type LoggerOptions } from '../logger/index.js'
import { ContextLoader } from '../memory/context-loader.js'
import { LogStore } from '../storage/log-store.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

// src/core → package root, where the packaged prompt.txt / README.md live
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..')

export interface Container {
    config: ResolvedConfig
    logger: Logger
    fs: FileSystem
    llmClient: LLMClient
    cache: ExtractionCache
    contextLoader: ContextLoader
    extractionClient: ExtractionClient
    logStore: LogStore
}

export interface ContainerOverrides extends LoggerOptions {
    logger?: Logger
    fs?: FileSystem
    llmClient?: LLMClient
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config, { verbose: overrides.verbose })
    const fs = overrides.fs ?? new NodeFileSystem()
    const llmClient = overrides.llmClient ?? createLLMClient(config, logger)
    const cache = new ExtractionCache()
    const contextLoader = new ContextLoader(fs, [config.projectDir, PACKAGE_ROOT], logger)
    const extractionClient = new ExtractionClient({
        llmClient,
        cache,
        systemPrompt: () => contextLoader.buildSystemPrompt(),
        logger,
        model: config.model,
        temperature: config.temperature,
    })
    const logStore = new LogStore({ logger })

    return {
        config,
        logger,
        fs,
        llmClient,
        cache,
        contextLoader,
        extractionClient,
        logStore,
    }
}
