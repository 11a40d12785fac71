import * as path from 'path';
import { FsStore } from './fs/fs_store';
import { MemoryStore } from './memory/memory_store';
import type { Stores } from './store';

/**
 * Filesystem-backed stores rooted at a workspace directory (e.g. `.vulnrank`).
 */
export function createFsStores(root: string): Stores {
  return {
    vulnerabilities: new FsStore({ basePath: path.join(root, 'vulnerabilities') }),
    assets: new FsStore({ basePath: path.join(root, 'assets') }),
    intel: new FsStore({ basePath: path.join(root, 'intel') }),
    assessments: new FsStore({ basePath: path.join(root, 'assessments') }),
  };
}

export function createMemoryStores(): Stores {
  return {
    vulnerabilities: new MemoryStore(),
    assets: new MemoryStore(),
    intel: new MemoryStore(),
    assessments: new MemoryStore(),
  };
}
