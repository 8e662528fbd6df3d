import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Uncompressed ZIP (STORE method) writer, file names flagged as UTF-8.
 */

export interface ZipEntry {
  filename: string;
  content: string | Uint8Array;
}

const LOCAL_HEADER_SIZE = 30;
const CENTRAL_HEADER_SIZE = 46;
const END_RECORD_SIZE = 22;
const ZIP_VERSION = 20;
const UTF8_FLAG = 0x0800;

/**
 * Create a ZIP file from an array of file entries
 */
export function createZip(entries: ZipEntry[]): Uint8Array {
  const encoder = new TextEncoder();
  const files: Array<{
    filename: Uint8Array;
    content: Uint8Array;
    crc32: number;
    offset: number;
  }> = [];

  let offset = 0;
  for (const entry of entries) {
    const filename = encoder.encode(entry.filename);
    const content = typeof entry.content === 'string' ? encoder.encode(entry.content) : entry.content;
    files.push({ filename, content, crc32: crc32Calculate(content), offset });
    offset += LOCAL_HEADER_SIZE + filename.length + content.length;
  }

  let centralDirSize = 0;
  for (const file of files) {
    centralDirSize += CENTRAL_HEADER_SIZE + file.filename.length;
  }

  const buffer = new Uint8Array(offset + centralDirSize + END_RECORD_SIZE);
  const view = new DataView(buffer.buffer);
  let pos = 0;

  const u16 = (value: number) => {
    view.setUint16(pos, value, true);
    pos += 2;
  };
  const u32 = (value: number) => {
    view.setUint32(pos, value, true);
    pos += 4;
  };
  const bytes = (value: Uint8Array) => {
    buffer.set(value, pos);
    pos += value.length;
  };

  for (const file of files) {
    u32(0x04034b50);
    u16(ZIP_VERSION);
    u16(UTF8_FLAG);
    u16(0); // store
    u16(0); // mod time
    u16(0); // mod date
    u32(file.crc32);
    u32(file.content.length);
    u32(file.content.length);
    u16(file.filename.length);
    u16(0); // extra field
    bytes(file.filename);
    bytes(file.content);
  }

  const centralDirOffset = pos;

  for (const file of files) {
    u32(0x02014b50);
    u16(ZIP_VERSION); // made by
    u16(ZIP_VERSION); // needed
    u16(UTF8_FLAG);
    u16(0);
    u16(0);
    u16(0);
    u32(file.crc32);
    u32(file.content.length);
    u32(file.content.length);
    u16(file.filename.length);
    u16(0); // extra field
    u16(0); // comment
    u16(0); // disk number
    u16(0); // internal attributes
    u32(0); // external attributes
    u32(file.offset);
    bytes(file.filename);
  }

  u32(0x06054b50);
  u16(0);
  u16(0);
  u16(files.length);
  u16(files.length);
  u32(centralDirSize);
  u32(centralDirOffset);
  u16(0); // comment length

  return buffer;
}

/**
 * Calculate CRC-32 checksum
 */
export function crc32Calculate(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = crc32Table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// Pre-computed CRC-32 lookup table
const crc32Table = new Uint32Array(256);
for (let i = 0; i < 256; i++) {
  let c = i;
  for (let j = 0; j < 8; j++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crc32Table[i] = c;
}

/** Every regular file under `dir`, named relative to it with `/` separators, sorted. */
export async function collectZipEntries(dir: string, prefix = ''): Promise<ZipEntry[]> {
  const dirents = await readdir(dir, { withFileTypes: true });
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const entries: ZipEntry[] = [];
  for (const dirent of dirents) {
    const fullPath = join(dir, dirent.name);
    const filename = prefix ? `${prefix}/${dirent.name}` : dirent.name;
    if (dirent.isDirectory()) {
      entries.push(...(await collectZipEntries(fullPath, filename)));
    } else if (dirent.isFile()) {
      entries.push({ filename, content: await readFile(fullPath) });
    }
  }
  return entries;
}

export async function zipDirectory(dir: string, outputPath: string): Promise<number> {
  const entries = await collectZipEntries(dir);
  await writeFile(outputPath, createZip(entries));
  return entries.length;
}
