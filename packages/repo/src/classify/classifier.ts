import fs from 'node:fs/promises';
import path from 'node:path';
import mime from 'mime-types';
import isBinaryPath from 'is-binary-path';
import { fromBuffer } from 'file-type';
import { logger as defaultLogger, toError, type Logger } from '@gitsift/shared';
import { BINARY_EXTENSIONS, extensionMimeType, isTextMimeType } from './fileTypes';

export const OCTET_STREAM = 'application/octet-stream';
export const PLAIN_TEXT = 'text/plain';

/** Bytes inspected by the NUL-byte fallback. */
export const BYTE_SCAN_LENGTH = 1024;
/** Bytes handed to the content sniffer; enough for every signature it knows. */
const SNIFF_LENGTH = 4100;

export interface FileClassification {
  mimeType: string;
  isBinary: boolean;
}

export type ContentSniffer = (head: Uint8Array) => Promise<string | undefined>;

export interface FileClassifierOptions {
  logger?: Logger;
  /** Replaces the default magic-number sniffer. */
  sniff?: ContentSniffer;
}

const sniffWithFileType: ContentSniffer = async (head) => (await fromBuffer(head))?.mime;

/**
 * Layered MIME / binary detection: extension blocklist, extension tables,
 * content sniffing, then a NUL-byte scan of the first kilobyte.
 */
export class FileClassifier {
  private readonly logger: Logger;
  private readonly sniff: ContentSniffer;

  constructor(options: FileClassifierOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'classifier' });
    this.sniff = options.sniff ?? sniffWithFileType;
  }

  async classify(filePath: string): Promise<FileClassification> {
    const ext = path.extname(filePath).toLowerCase();
    if (BINARY_EXTENSIONS.has(ext) || isBinaryPath(filePath)) {
      return { mimeType: mime.lookup(filePath) || OCTET_STREAM, isBinary: true };
    }

    const guessed = extensionMimeType(filePath) ?? (mime.lookup(filePath) || undefined);
    if (guessed) {
      return { mimeType: guessed, isBinary: !isTextMimeType(guessed) };
    }

    let head: Uint8Array;
    try {
      head = await readHead(filePath, SNIFF_LENGTH);
    } catch (error) {
      this.logger.debug(`Cannot read ${filePath}: ${toError(error).message}`);
      return { mimeType: OCTET_STREAM, isBinary: true };
    }

    try {
      const sniffed = await this.sniff(head);
      if (sniffed) {
        return { mimeType: sniffed, isBinary: !isTextMimeType(sniffed) };
      }
    } catch (error) {
      this.logger.debug(`Content sniffing failed for ${filePath}: ${toError(error).message}`);
    }

    return containsNul(head.subarray(0, BYTE_SCAN_LENGTH))
      ? { mimeType: OCTET_STREAM, isBinary: true }
      : { mimeType: PLAIN_TEXT, isBinary: false };
  }

  async isBinary(filePath: string): Promise<boolean> {
    return (await this.classify(filePath)).isBinary;
  }
}

async function readHead(filePath: string, length: number): Promise<Uint8Array> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function containsNul(bytes: Uint8Array): boolean {
  return bytes.includes(0);
}
