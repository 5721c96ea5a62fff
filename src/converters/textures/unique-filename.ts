import * as path from 'path';
import { DEFAULT_CONFIG } from '../../constants/config';

/**
 * Hands out destination file names that are unique within one rewrite pass.
 * Collisions get `__N` before the extension: `skin.png`, `skin__1.png`, ...
 */
export class UniqueFilenameAllocator {
  private readonly used = new Set<string>();

  constructor(reserved: Iterable<string> = []) {
    for (const name of reserved) this.used.add(name);
  }

  allocate(base: string): string {
    const name = base || DEFAULT_CONFIG.FALLBACK_TEXTURE_NAME;
    if (!this.used.has(name)) {
      this.used.add(name);
      return name;
    }

    const ext = path.extname(name);
    const stem = name.slice(0, name.length - ext.length);
    for (let i = 1; ; i++) {
      const candidate = `${stem}__${i}${ext}`;
      if (!this.used.has(candidate)) {
        this.used.add(candidate);
        return candidate;
      }
    }
  }

  has(name: string): boolean {
    return this.used.has(name);
  }
}
