import { readFile } from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { SourceUnavailableError } from './errors';
import { srtToText } from './srt';

export interface TextSource {
  /** Label recorded in the result metadata. */
  describe(): string;
  /** Full text content. Rejects with SourceUnavailableError. */
  read(): Promise<string>;
}

export function decodeText(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    // Not valid UTF-8; older transcripts are often Latin-1
    return buffer.toString('latin1');
  }
}

export class FileTextSource implements TextSource {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<string> {
    try {
      return decodeText(await readFile(this.filePath));
    } catch (error) {
      throw new SourceUnavailableError(this.filePath, error);
    }
  }
}

export class SrtTextSource implements TextSource {
  private file: FileTextSource;

  constructor(private readonly filePath: string) {
    this.file = new FileTextSource(filePath);
  }

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<string> {
    return srtToText(await this.file.read());
  }
}

export class StreamTextSource implements TextSource {
  constructor(private readonly stream: Readable, private readonly label = 'stream') {}

  describe(): string {
    return this.label;
  }

  async read(): Promise<string> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of this.stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    } catch (error) {
      throw new SourceUnavailableError(this.label, error);
    }
    return decodeText(Buffer.concat(chunks));
  }
}

/**
 * A path string becomes a file source, or an SRT source for `.srt` files.
 */
export function resolveSource(locator: string | TextSource): TextSource {
  if (typeof locator !== 'string') return locator;
  return path.extname(locator).toLowerCase() === '.srt'
    ? new SrtTextSource(locator)
    : new FileTextSource(locator);
}
