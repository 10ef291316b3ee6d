// src/services/scanner.ts
// What: Filesystem scanner for course documents.
// How: Recursively walks a directory and returns { filename, path } for .txt and .md files, sorted by filename.
//      A missing directory yields null so callers can tell it apart from an empty one.

import fs from 'node:fs/promises';
import path from 'node:path';

const COURSE_EXTENSIONS = new Set(['.txt', '.md']);

export interface ScannedFile {
  filename: string;
  path: string; // absolute path
}

export async function scanCourseDocuments(root: string): Promise<ScannedFile[] | null> {
  const absRoot = path.resolve(root);
  try {
    const stat = await fs.stat(absRoot);
    if (!stat.isDirectory()) return null;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
  const out: ScannedFile[] = [];
  await walk(absRoot, out);
  return out.sort((a, b) => a.filename.localeCompare(b.filename));
}

async function walk(dir: string, acc: ScannedFile[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      await walk(full, acc);
    } else if (e.isFile() && COURSE_EXTENSIONS.has(path.extname(e.name).toLowerCase())) {
      acc.push({ filename: e.name, path: full });
    }
  }
}
