/**
 * File Transport
 *
 * Appends JSON lines to a file and rotates it by size,
 * keeping a configurable number of rotated files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';
import { redactSensitiveData } from '../../utils/redactor.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private readonly maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize = 0;
    private rotating: Promise<void> | null = null;
    private pendingLines: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }
        this.writeStream = this.openStream();
    }

    private openStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify({ ...entry, context: redactSensitiveData(entry.context) }) + '\n';

        // Buffer while rotating so no line is lost
        if (!this.writeStream || this.rotating) {
            this.pendingLines.push(line);
            return;
        }

        const lineSize = Buffer.byteLength(line, 'utf8');
        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLines.push(line);
            this.rotating = this.rotate().finally(() => {
                this.rotating = null;
            });
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Shift log.N-1 -> log.N ... log -> log.1, then reopen and flush buffered lines
     */
    private async rotate(): Promise<void> {
        try {
            const stream = this.writeStream;
            this.writeStream = null;
            if (stream) {
                await new Promise<void>((resolve) => stream.end(() => resolve()));
            }

            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });
            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await this.renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await this.renameIfExists(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.writeStream = this.openStream();
            this.flushPending(this.writeStream);
        } catch (error) {
            console.error('FileTransport rotation error:', error);
        }
    }

    private async renameIfExists(from: string, to: string): Promise<void> {
        if (fs.existsSync(from)) {
            await fs.promises.rename(from, to);
        }
    }

    private flushPending(stream: fs.WriteStream): void {
        const lines = this.pendingLines;
        this.pendingLines = [];
        for (const line of lines) {
            stream.write(line);
            this.currentSize += Buffer.byteLength(line, 'utf8');
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    async destroy(): Promise<void> {
        if (this.rotating) {
            await this.rotating;
        }
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }
    }
}
