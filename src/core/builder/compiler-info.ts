/**
 * Mergeable bag of compiler settings.
 *
 * Additive categories (cflags, lflags, aflags, includes, ignore patterns)
 * accumulate in merge order without deduplication. The overwritable
 * category (linker script) is replaced by any merge that sets it.
 */

export interface CompilerInfoData {
  cflags: string[];
  lflags: string[];
  aflags: string[];
  includes: string[];
  /** Regexes matched against source file names to skip. */
  ignoreFiles: string[];
  /** Regexes matched against directory names to skip. */
  ignoreDirs: string[];
  linkerScript?: string;
}

export class CompilerInfo implements CompilerInfoData {
  cflags: string[] = [];
  lflags: string[] = [];
  aflags: string[] = [];
  includes: string[] = [];
  ignoreFiles: string[] = [];
  ignoreDirs: string[] = [];
  linkerScript?: string;

  static from(data: Partial<CompilerInfoData>): CompilerInfo {
    return new CompilerInfo().merge(data);
  }

  /**
   * Merge `other` into this instance and return it.
   */
  merge(other: Partial<CompilerInfoData>): this {
    this.cflags.push(...(other.cflags ?? []));
    this.lflags.push(...(other.lflags ?? []));
    this.aflags.push(...(other.aflags ?? []));
    this.includes.push(...(other.includes ?? []));
    this.ignoreFiles.push(...(other.ignoreFiles ?? []));
    this.ignoreDirs.push(...(other.ignoreDirs ?? []));
    if (other.linkerScript !== undefined) {
      this.linkerScript = other.linkerScript;
    }
    return this;
  }

  /**
   * Append a preprocessor define: `-DNAME` or `-DNAME=value`.
   */
  addDefine(name: string, value?: string): this {
    this.cflags.push(value === undefined ? `-D${name}` : `-D${name}=${value}`);
    return this;
  }

  clone(): CompilerInfo {
    return new CompilerInfo().merge(this);
  }
}
