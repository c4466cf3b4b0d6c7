/**
 * File Transport
 *
 * Appends JSON lines to a file, rotating it to `<path>.1` once it grows past maxSize.
 * Writes are synchronous: task processes terminate through process.exit(), which
 * would drop anything still queued on a stream.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
}

export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private fd: number | null = null;
    private currentSize: number = 0;

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;

        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        this.open();
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        if (this.currentSize > 0 && this.currentSize + lineSize > this.maxSize) {
            this.rotate();
        }

        fs.writeSync(this.open(), line, null, 'utf8');
        this.currentSize += lineSize;
    }

    /**
     * Close the file; a later write opens it again
     */
    destroy(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }

    private open(): number {
        if (this.fd === null) {
            this.fd = fs.openSync(this.filePath, 'a');
            this.currentSize = fs.fstatSync(this.fd).size;
        }
        return this.fd;
    }

    private rotate(): void {
        this.destroy();
        fs.renameSync(this.filePath, `${this.filePath}.1`);
        this.currentSize = 0;
    }
}
