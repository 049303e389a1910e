import { inflateRawSync } from 'node:zlib';

import type { Diagnostic } from '../core/diagnostics.js';
import { parseXmlToAst, XmlParseError } from './xml-ast.js';
import { attribute, descend } from './xml-utils.js';

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const END_OF_DIRECTORY_SIGNATURE = 0x06054b50;
const END_OF_DIRECTORY_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

const CONTAINER_PATH = 'META-INF/container.xml';

interface ArchiveEntry {
  name: string;
  method: number;
  compressedSize: number;
  headerOffset: number;
}

export interface MxlExtractionResult {
  xmlText?: string;
  diagnostics: Diagnostic[];
}

/**
 * Pull the score document out of a compressed MusicXML (`.mxl`) archive.
 * The rootfile named by `META-INF/container.xml` wins; without a usable
 * container the first `.musicxml` entry, then the first `.xml` entry, is used.
 */
export function extractMusicXmlFromMxl(data: Uint8Array): MxlExtractionResult {
  const diagnostics: Diagnostic[] = [];

  let archive: ZipArchive;
  try {
    archive = new ZipArchive(data);
  } catch (error) {
    diagnostics.push({ code: 'MXL_INVALID_ARCHIVE', severity: 'error', message: errorMessage(error) });
    return { diagnostics };
  }

  const scorePath = resolveRootFile(archive, diagnostics) ?? archive.findScoreLikeEntry();
  if (!scorePath) {
    diagnostics.push({ code: 'MXL_SCORE_FILE_NOT_FOUND', severity: 'error', message: 'Archive contains no score XML entry.' });
    return { diagnostics };
  }

  const entry = archive.find(scorePath);
  if (!entry) {
    diagnostics.push({
      code: 'MXL_SCORE_FILE_NOT_FOUND',
      severity: 'error',
      message: `Rootfile '${scorePath}' is not present in the archive.`
    });
    return { diagnostics };
  }

  try {
    return { xmlText: archive.readText(entry), diagnostics };
  } catch (error) {
    diagnostics.push({ code: 'MXL_SCORE_FILE_READ_FAILED', severity: 'error', message: errorMessage(error) });
    return { diagnostics };
  }
}

function resolveRootFile(archive: ZipArchive, diagnostics: Diagnostic[]): string | undefined {
  const container = archive.find(CONTAINER_PATH);
  if (!container) {
    diagnostics.push({
      code: 'MXL_CONTAINER_MISSING',
      severity: 'warning',
      message: `${CONTAINER_PATH} not found; using the first score entry.`
    });
    return undefined;
  }

  try {
    const root = parseXmlToAst(archive.readText(container), CONTAINER_PATH);
    const fullPath = attribute(descend(root, 'rootfiles/rootfile'), 'full-path');
    if (!fullPath) {
      diagnostics.push({
        code: 'MXL_CONTAINER_INVALID',
        severity: 'warning',
        message: 'container.xml names no rootfile full-path; using the first score entry.'
      });
    }
    return fullPath ? normalizeEntryName(fullPath) : undefined;
  } catch (error) {
    if (!(error instanceof XmlParseError)) {
      throw error;
    }
    diagnostics.push({
      code: 'MXL_CONTAINER_INVALID',
      severity: 'warning',
      message: `container.xml is malformed (${error.message}); using the first score entry.`
    });
    return undefined;
  }
}

/** Read-only view over the central directory of a ZIP archive. */
class ZipArchive {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  readonly entries: ArchiveEntry[];

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.entries = this.readCentralDirectory();
  }

  /** Exact name match first, then case-insensitive. */
  find(name: string): ArchiveEntry | undefined {
    const wanted = normalizeEntryName(name);
    return (
      this.entries.find((entry) => entry.name === wanted) ??
      this.entries.find((entry) => entry.name.toLowerCase() === wanted.toLowerCase())
    );
  }

  findScoreLikeEntry(): string | undefined {
    const candidates = this.entries
      .map((entry) => entry.name)
      .filter((name) => !name.toLowerCase().startsWith('meta-inf/'));
    return (
      candidates.find((name) => name.toLowerCase().endsWith('.musicxml')) ??
      candidates.find((name) => name.toLowerCase().endsWith('.xml'))
    );
  }

  readText(entry: ArchiveEntry): string {
    return new TextDecoder().decode(this.readEntry(entry));
  }

  private readEntry(entry: ArchiveEntry): Uint8Array {
    const offset = entry.headerOffset;
    this.require(offset, 30, `local header of '${entry.name}'`);
    if (this.u32(offset) !== LOCAL_HEADER_SIGNATURE) {
      throw new Error(`Local header signature of '${entry.name}' is invalid.`);
    }

    const start = offset + 30 + this.u16(offset + 26) + this.u16(offset + 28);
    this.require(start, entry.compressedSize, `payload of '${entry.name}'`);
    const payload = this.bytes.subarray(start, start + entry.compressedSize);

    switch (entry.method) {
      case METHOD_STORED:
        return payload;
      case METHOD_DEFLATE:
        return new Uint8Array(inflateRawSync(payload));
      default:
        throw new Error(`Compression method ${entry.method} of '${entry.name}' is not supported.`);
    }
  }

  private readCentralDirectory(): ArchiveEntry[] {
    const end = this.findEndOfDirectory();
    const count = this.u16(end + 10);
    const size = this.u32(end + 12);
    let cursor = this.u32(end + 16);
    if (cursor + size > this.bytes.length) {
      throw new Error('Central directory lies outside the archive.');
    }

    const entries: ArchiveEntry[] = [];
    for (let index = 0; index < count; index += 1) {
      this.require(cursor, 46, 'central directory header');
      if (this.u32(cursor) !== CENTRAL_HEADER_SIGNATURE) {
        throw new Error('Central directory header signature is invalid.');
      }

      const nameLength = this.u16(cursor + 28);
      const extraLength = this.u16(cursor + 30);
      const commentLength = this.u16(cursor + 32);
      this.require(cursor + 46, nameLength, 'entry name');

      entries.push({
        name: normalizeEntryName(new TextDecoder().decode(this.bytes.subarray(cursor + 46, cursor + 46 + nameLength))),
        method: this.u16(cursor + 10),
        compressedSize: this.u32(cursor + 20),
        headerOffset: this.u32(cursor + 42)
      });
      cursor += 46 + nameLength + extraLength + commentLength;
    }
    return entries;
  }

  private findEndOfDirectory(): number {
    const lowest = Math.max(0, this.bytes.length - END_OF_DIRECTORY_SIZE - MAX_COMMENT_LENGTH);
    for (let offset = this.bytes.length - END_OF_DIRECTORY_SIZE; offset >= lowest; offset -= 1) {
      if (this.u32(offset) === END_OF_DIRECTORY_SIGNATURE) {
        return offset;
      }
    }
    throw new Error('End-of-central-directory record not found; not a ZIP archive.');
  }

  private u16(offset: number): number {
    this.require(offset, 2, 'u16');
    return this.view.getUint16(offset, true);
  }

  private u32(offset: number): number {
    this.require(offset, 4, 'u32');
    return this.view.getUint32(offset, true);
  }

  private require(offset: number, length: number, what: string): void {
    if (offset < 0 || offset + length > this.bytes.length) {
      throw new Error(`Archive is truncated while reading ${what}.`);
    }
  }
}

function normalizeEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^\/+/, '');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
