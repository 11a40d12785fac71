import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FsStore } from './fs/fs_store';
import { MemoryStore } from './memory/memory_store';
import { createFsStores, createMemoryStores } from './stores';
import { STORE_NAMES } from './store';

describe('store factories', () => {
  it('createMemoryStores should build one MemoryStore per store name', () => {
    const stores = createMemoryStores();
    for (const name of STORE_NAMES) {
      expect(stores[name]).toBeInstanceOf(MemoryStore);
    }
  });

  it('createFsStores should place each store in its own directory', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'vulnrank-stores-'));
    try {
      const stores = createFsStores(root);
      expect(stores.assets).toBeInstanceOf(FsStore);

      await stores.assets.put('web-01', { id: 'web-01', type: 'web', ipAddresses: [], businessFunctions: [] });

      const entries = await fs.readdir(root);
      expect(entries).toEqual(['assets']);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
