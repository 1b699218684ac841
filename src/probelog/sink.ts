import { closeSync, openSync, writeSync } from 'fs';

/**
 * Destination for CSV text. The caller constructs it, hands it to the
 * serializer and owns its release.
 */
export interface TextSink {
    /** Human-readable destination, used in diagnostics. */
    readonly name: string;
    write(chunk: string): void;
    close(): void;
}

/**
 * Writes to a file, opened (and truncated) on the first write only, so a run
 * that never writes leaves no file behind.
 */
export class FileSink implements TextSink {
    private fd: number | null = null;
    private closed = false;

    constructor(private readonly filePath: string) {}

    get name(): string {
        return this.filePath;
    }

    write(chunk: string): void {
        if (this.closed) throw new Error(`FileSink: write after close (${this.filePath})`);
        if (this.fd === null) {
            this.fd = openSync(this.filePath, 'w');
        }
        writeSync(this.fd, chunk, null, 'utf8');
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.fd !== null) {
            closeSync(this.fd);
            this.fd = null;
        }
    }
}

export interface TextStream {
    write(chunk: string): unknown;
}

/** Standard output. Closing releases nothing; the process owns the stream. */
export class StdoutSink implements TextSink {
    readonly name = 'stdout';

    constructor(private readonly stream: TextStream = process.stdout) {}

    write(chunk: string): void {
        this.stream.write(chunk);
    }

    close(): void {
        // process.stdout must stay open
    }
}

export class MemorySink implements TextSink {
    readonly name: string;
    private readonly chunks: string[] = [];
    private _closed = false;

    constructor(name = 'memory') {
        this.name = name;
    }

    get text(): string {
        return this.chunks.join('');
    }

    get closed(): boolean {
        return this._closed;
    }

    write(chunk: string): void {
        if (this._closed) throw new Error('MemorySink: write after close');
        this.chunks.push(chunk);
    }

    close(): void {
        this._closed = true;
    }
}

/**
 * Runs `fn` with the sink and closes it afterwards, whether `fn` returns or throws.
 */
export function withSink<T>(sink: TextSink, fn: (sink: TextSink) => T): T {
    try {
        return fn(sink);
    } finally {
        sink.close();
    }
}
