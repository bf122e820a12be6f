import type { BacklogRecord } from './schema.js'

/**
 * Process-lifetime memo of extraction results keyed by model and normalized prompt.
 * One instance is built per process and handed to the extraction client.
 */
export class ExtractionCache {
    private entries = new Map<string, BacklogRecord>()

    private static key(model: string, prompt: string): string {
        return JSON.stringify([model, prompt])
    }

    get(model: string, prompt: string): BacklogRecord | undefined {
        return this.entries.get(ExtractionCache.key(model, prompt))
    }

    set(model: string, prompt: string, record: BacklogRecord): void {
        this.entries.set(ExtractionCache.key(model, prompt), record)
    }

    has(model: string, prompt: string): boolean {
        return this.entries.has(ExtractionCache.key(model, prompt))
    }

    clear(): void {
        this.entries.clear()
    }

    get size(): number {
        return this.entries.size
    }
}
