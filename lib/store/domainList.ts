import path from 'path';
import { PersistenceError, errorMessage } from '../errors';
import { readFileIfExists, writeFileAtomic } from './atomic';

/**
 * The monitored domain list, kept in `<dir>/domains.json` so that
 * add/remove commands survive a restart.
 */
export class DomainListFile {
  readonly file: string;

  constructor(dir: string) {
    this.file = path.join(dir, 'domains.json');
  }

  async load(): Promise<string[] | null> {
    let raw: string | null;
    try {
      raw = await readFileIfExists(this.file);
    } catch (err) {
      throw new PersistenceError('load', '*', `cannot read ${this.file}: ${errorMessage(err)}`, err);
    }
    if (raw === null) return null;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError('load', '*', `malformed domain list ${this.file}: ${errorMessage(err)}`, err);
    }
    if (!Array.isArray(data) || !data.every((d): d is string => typeof d === 'string')) {
      throw new PersistenceError('load', '*', `domain list ${this.file} is not an array of strings`);
    }
    return data;
  }

  async save(domains: readonly string[]): Promise<void> {
    try {
      await writeFileAtomic(this.file, JSON.stringify(domains, null, 2));
    } catch (err) {
      throw new PersistenceError('save', '*', `cannot write ${this.file}: ${errorMessage(err)}`, err);
    }
  }
}

export default DomainListFile;
