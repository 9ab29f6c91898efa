import * as readline from 'readline';

/**
 * Line-oriented input source for the menu. question() resolves to null once
 * input has ended (Ctrl+D, closed pipe).
 */
export interface Prompter {
    question(query: string): Promise<string | null>;
    close(): void;
}

/**
 * Reads every 'line' event into a queue. Piped or pasted input delivers
 * several lines at once, and each one must reach a later question().
 */
export class ReadlinePrompter implements Prompter {
    private readonly rl: readline.Interface;
    private readonly buffered: string[] = [];
    private readonly waiting: Array<(answer: string | null) => void> = [];
    private closed = false;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, output });
        this.rl.on('line', line => {
            const resolve = this.waiting.shift();
            if (resolve) {
                resolve(line);
            } else {
                this.buffered.push(line);
            }
        });
        this.rl.on('close', () => {
            this.closed = true;
            for (const resolve of this.waiting.splice(0)) {
                resolve(null);
            }
        });
    }

    question(query: string): Promise<string | null> {
        if (query !== '') {
            this.output.write(query);
        }

        const next = this.buffered.shift();
        if (next !== undefined) {
            return Promise.resolve(next);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }
}
