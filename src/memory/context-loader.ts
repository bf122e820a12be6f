import path from 'node:path'
import { PROMPT_FILE_NAME, README_CONTEXT_CHARS, README_FILE_NAME } from '../config/defaults.js'
import type { ReadmeContext } from '../backlog/system-prompt.js'
import { buildSystemPrompt, DEFAULT_SYSTEM_PROMPT } from '../backlog/system-prompt.js'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'

const README_READ_LIMIT = 2000

/**
 * Pulls the project title (first `#` line) and first paragraph out of a README.
 * Heading and blank lines before the paragraph are skipped; the paragraph ends at a blank line.
 */
export function summarizeReadme(content: string, maxChars = README_CONTEXT_CHARS): string {
    const lines = content.split('\n')

    const projectName = lines.map((l) => l.trim()).find((l) => l.startsWith('#')) ?? ''

    let description = ''
    let started = false
    for (const raw of lines.slice(1)) {
        const line = raw.trim()
        if (!started) {
            if (line && !line.startsWith('#')) {
                started = true
                description += `${line} `
            }
            continue
        }
        if (!line) break
        description += `${line} `
    }

    const result = `${projectName}\n\n${description}`.trim()
    if (result.length > maxChars) {
        return `${result.slice(0, maxChars - 3)}...`
    }
    return result
}

/**
 * Reads prompt.txt and README.md from a list of directories, first match wins.
 * The working directory usually comes first so a project can override the packaged files.
 */
export class ContextLoader {
    constructor(
        private fs: FileSystem,
        private searchDirs: string[],
        private logger: Logger
    ) {}

    async loadPromptTemplate(): Promise<string> {
        for (const dir of this.searchDirs) {
            const file = path.join(dir, PROMPT_FILE_NAME)
            if (!(await this.fs.exists(file))) continue
            try {
                return (await this.fs.readText(file)).trim()
            } catch (error) {
                this.logger.warn({ file, error: errorMessage(error) }, 'Failed to read prompt file')
            }
        }
        return DEFAULT_SYSTEM_PROMPT
    }

    async loadReadmeContext(maxChars = README_CONTEXT_CHARS): Promise<ReadmeContext> {
        for (const dir of this.searchDirs) {
            const file = path.join(dir, README_FILE_NAME)
            if (!(await this.fs.exists(file))) continue
            try {
                const content = (await this.fs.readText(file)).slice(0, README_READ_LIMIT)
                return { excerpt: summarizeReadme(content, maxChars), found: true }
            } catch (error) {
                this.logger.warn({ file, error: errorMessage(error) }, 'Failed to read README file')
                break
            }
        }
        return { excerpt: '', found: false }
    }

    async buildSystemPrompt(): Promise<string> {
        const [template, context] = await Promise.all([this.loadPromptTemplate(), this.loadReadmeContext()])
        return buildSystemPrompt(template, context)
    }
}
