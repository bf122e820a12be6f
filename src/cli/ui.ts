import pc from 'picocolors'
import type { BacklogRecord } from '../backlog/schema.js'

export const VERSION = '0.1.0'

export const colors = {
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    bold: (text: string) => pc.bold(text),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatWarning(message: string): string {
    return `${colors.warn('Warning:')} ${message}`
}

export function formatRecord(record: BacklogRecord): string {
    return [
        `${colors.bold('Title:')} ${record.title}`,
        `${colors.bold('Difficulty:')} ${record.difficulty}`,
        `${colors.bold('Description:')} ${record.description}`,
    ].join('\n')
}

export function formatSaved(record: BacklogRecord): string {
    return colors.success(`Entry saved: ${record.title} (difficulty: ${record.difficulty})`)
}
