/**
 * Content-addressed cache of compiled class files.
 *
 * LRU over a Map (insertion order = recency), bounded by entry count and by
 * total bytes. Under heap pressure the least recently used half of the byte
 * budget is released, so a miss is always a legitimate answer.
 *
 * Every method is synchronous: on the event loop a get and a put can never
 * interleave, and concurrent submissions of the same source simply race to
 * put identical artifacts (last one wins).
 */

import { getHeapStatistics } from 'node:v8';
import { Logger } from '@compilebox/shared/Utils/logger.js';

export interface CompiledArtifact {
  /** Fingerprint of the source text the files were compiled from */
  fingerprint: string;
  /** Entry-point class name the source declared */
  className: string;
  /** File name (e.g. `Hello.class`) → bytecode */
  classFiles: ReadonlyMap<string, Buffer>;
}

export interface HeapUsage {
  used: number;
  limit: number;
}

export interface ArtifactCacheOptions {
  maxEntries: number;
  maxBytes: number;
  /** used/limit heap ratio above which entries are reclaimed */
  heapPressureRatio: number;
  heapUsage?: () => HeapUsage;
  logger?: Logger;
}

export interface ArtifactCacheStats {
  entries: number;
  bytes: number;
  hits: number;
  misses: number;
  evictions: number;
  reclaimed: number;
}

interface Entry {
  fingerprint: string;
  className: string;
  classFiles: Map<string, Buffer>;
  bytes: number;
}

function processHeapUsage(): HeapUsage {
  const stats = getHeapStatistics();
  return { used: stats.used_heap_size, limit: stats.heap_size_limit };
}

function copyFiles(files: ReadonlyMap<string, Buffer>): Map<string, Buffer> {
  const copy = new Map<string, Buffer>();
  for (const [name, bytes] of files) {
    copy.set(name, Buffer.from(bytes));
  }
  return copy;
}

function sizeOf(files: ReadonlyMap<string, Buffer>): number {
  let total = 0;
  for (const bytes of files.values()) total += bytes.length;
  return total;
}

export class ArtifactCache {
  private readonly entries = new Map<string, Entry>();
  private readonly heapUsage: () => HeapUsage;
  private readonly logger: Logger;
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private reclaimed = 0;

  constructor(private readonly options: ArtifactCacheOptions) {
    this.heapUsage = options.heapUsage ?? processHeapUsage;
    this.logger = (options.logger ?? new Logger('compiler')).child('cache');
  }

  get(fingerprint: string): CompiledArtifact | undefined {
    this.reclaimUnderPressure();

    const entry = this.entries.get(fingerprint);
    if (!entry || entry.fingerprint !== fingerprint) {
      this.misses++;
      return undefined;
    }

    // Refresh recency
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    this.hits++;

    return {
      fingerprint: entry.fingerprint,
      className: entry.className,
      classFiles: copyFiles(entry.classFiles),
    };
  }

  put(artifact: CompiledArtifact): void {
    const classFiles = copyFiles(artifact.classFiles);
    const bytes = sizeOf(classFiles);

    if (bytes > this.options.maxBytes) {
      this.logger.debug('Artifact larger than cache budget, not cached', { bytes });
      return;
    }

    this.remove(artifact.fingerprint);
    this.entries.set(artifact.fingerprint, {
      fingerprint: artifact.fingerprint,
      className: artifact.className,
      classFiles,
      bytes,
    });
    this.totalBytes += bytes;

    while (this.entries.size > this.options.maxEntries || this.totalBytes > this.options.maxBytes) {
      if (!this.evictEldest()) break;
      this.evictions++;
    }

    this.reclaimUnderPressure();
  }

  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }

  stats(): ArtifactCacheStats {
    return {
      entries: this.entries.size,
      bytes: this.totalBytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      reclaimed: this.reclaimed,
    };
  }

  private remove(fingerprint: string): void {
    const existing = this.entries.get(fingerprint);
    if (!existing) return;
    this.entries.delete(fingerprint);
    this.totalBytes -= existing.bytes;
  }

  private evictEldest(): boolean {
    const eldest = this.entries.keys().next();
    if (eldest.done) return false;
    this.remove(eldest.value);
    return true;
  }

  private reclaimUnderPressure(): void {
    if (this.entries.size === 0) return;
    const heap = this.heapUsage();
    if (heap.limit <= 0 || heap.used / heap.limit < this.options.heapPressureRatio) return;

    const target = Math.floor(this.options.maxBytes / 2);
    let dropped = 0;
    while (this.entries.size > 0 && (this.totalBytes > target || dropped === 0)) {
      this.evictEldest();
      dropped++;
    }
    this.reclaimed += dropped;
    this.logger.info('Reclaimed cache entries under heap pressure', {
      dropped,
      heapUsed: heap.used,
      heapLimit: heap.limit,
    });
  }
}
