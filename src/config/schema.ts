import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export type LogLevel = z.infer<typeof LogLevelSchema>

export const ConfigSchema = z.object({
    model: z.string().min(1).optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    logLevel: LogLevelSchema.optional(),
    logDir: z.string().min(1).optional(),
    backlogFile: z.string().min(1).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    model: string
    apiKey: string
    baseURL?: string
    temperature: number
    logLevel: LogLevel
    logDir: string
    backlogFile: string
    projectDir: string
}
