import fs from 'fs';
import path from 'path';
import { gerr } from '../log';

export type WriteResult = { ok: true; bytes: number } | { ok: false; message: string };

// Overwrites in place; a crash mid-write can leave a truncated file.
export function writeGuide(file: string, content: string): WriteResult {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf8');
    return { ok: true, bytes: Buffer.byteLength(content, 'utf8') };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    gerr(`writing output file ${file}: ${message}`);
    return { ok: false, message };
  }
}
