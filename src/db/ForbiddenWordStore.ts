import { normalizeWord } from '../tracker/MemoSanitizer.js';
import { Mutex } from './Mutex.js';
import { appendLine, readTextIfExists } from './fileStore.js';

/**
 * Forbidden-word set: the configured seed list plus words banned at
 * runtime, which are appended to a file so they survive restarts.
 */
export class ForbiddenWordStore {
    private readonly words = new Set<string>();
    private readonly lock = new Mutex();

    private constructor(private readonly path: string) {}

    public static async open(path: string, seed: readonly string[]): Promise<ForbiddenWordStore> {
        const store = new ForbiddenWordStore(path);
        for (const w of seed) store.addToSet(w);

        const content = await readTextIfExists(path);
        if (content !== null) {
            for (const line of content.split('\n')) store.addToSet(line);
        }
        return store;
    }

    private addToSet(word: string): string | null {
        const w = normalizeWord(word);
        if (w === null) return null;
        this.words.add(w);
        return w;
    }

    /** Snapshot of the current words; safe to hand to the sanitizer. */
    public list(): string[] {
        return [...this.words].sort();
    }

    /**
     * Add a word. Returns the normalized word, or `null` when it was invalid
     * or already present.
     */
    public async add(word: string): Promise<string | null> {
        const w = normalizeWord(word);
        if (w === null) return null;

        return this.lock.runExclusive(async () => {
            if (this.words.has(w)) return null;
            this.words.add(w);
            try {
                await appendLine(this.path, w);
            } catch (err: unknown) {
                console.error(`[ForbiddenWords] Failed to persist "${w}":`, err);
            }
            return w;
        });
    }
}
