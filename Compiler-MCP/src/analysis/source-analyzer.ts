/**
 * Text-pattern analysis of submitted Java source: entry-point class name,
 * presence of a runnable `main`, and the content fingerprint used as the
 * cache key. No parsing; comments and string literals are not excluded.
 */

import { createHash } from 'node:crypto';

const PUBLIC_CLASS_PATTERN = /^\s*public\s+(?:(?:final|abstract|strictfp)\s+)*class\s+([A-Za-z_$][\w$]*)/m;
const CLASS_NAME_PATTERN = /^\s*(?:(?:public|final|abstract|strictfp)\s+)*class\s+([A-Za-z_$][\w$]*)/m;
const MAIN_METHOD_PATTERN =
  /(?:public\s+static|static\s+public)\s+void\s+main\s*\(\s*(?:final\s+)?String\s*(?:\[\s*\]|\.\.\.)/;

export interface SourceAnalyzer {
  extractEntryPointName(sourceText: string): string | null;
  hasRunnableEntryPoint(sourceText: string): boolean;
  fingerprint(sourceText: string): string;
}

export class JavaSourceAnalyzer implements SourceAnalyzer {
  /**
   * Name of the first public top-level class, else of the first class declared.
   */
  extractEntryPointName(sourceText: string): string | null {
    if (sourceText.trim() === '') return null;
    const match = PUBLIC_CLASS_PATTERN.exec(sourceText) ?? CLASS_NAME_PATTERN.exec(sourceText);
    return match?.[1] ?? null;
  }

  hasRunnableEntryPoint(sourceText: string): boolean {
    return sourceText.trim() !== '' && MAIN_METHOD_PATTERN.test(sourceText);
  }

  /** SHA-256 of the UTF-8 source, hex encoded */
  fingerprint(sourceText: string): string {
    return createHash('sha256').update(sourceText, 'utf-8').digest('hex');
  }
}
