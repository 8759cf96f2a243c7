import { promises as fs } from 'fs';
import path from 'path';
import { PersistenceError, errorMessage } from '../errors';
import { decodeSubdomains, encodeSubdomains } from './codec';
import { readFileIfExists, writeFileAtomic } from './atomic';
import type { SubdomainStore } from './index';

export class FileSubdomainStore implements SubdomainStore {
  constructor(private readonly dir: string) {}

  fileFor(domain: string): string {
    // domains are validated upstream, this only keeps path separators out
    return path.join(this.dir, `${encodeURIComponent(domain)}.json`);
  }

  async load(domain: string): Promise<Set<string> | null> {
    const file = this.fileFor(domain);
    let raw: string | null;
    try {
      raw = await readFileIfExists(file);
    } catch (err) {
      throw new PersistenceError('load', domain, `cannot read ${file}: ${errorMessage(err)}`, err);
    }
    if (raw === null) return null;
    try {
      return decodeSubdomains(raw);
    } catch (err) {
      throw new PersistenceError('load', domain, `malformed subdomain file ${file}: ${errorMessage(err)}`, err);
    }
  }

  async save(domain: string, subdomains: ReadonlySet<string>): Promise<void> {
    const file = this.fileFor(domain);
    try {
      await writeFileAtomic(file, encodeSubdomains(domain, subdomains));
    } catch (err) {
      throw new PersistenceError('save', domain, `cannot write ${file}: ${errorMessage(err)}`, err);
    }
  }

  async delete(domain: string): Promise<void> {
    const file = this.fileFor(domain);
    try {
      await fs.rm(file, { force: true });
    } catch (err) {
      throw new PersistenceError('delete', domain, `cannot delete ${file}: ${errorMessage(err)}`, err);
    }
  }
}

export default FileSubdomainStore;
