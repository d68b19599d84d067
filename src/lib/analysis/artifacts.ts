/**
 * Artifact scope: tracks generated design files until the engine has used them.
 *
 * Every exit path (confirmed run, cancellation, interrupt, engine abort) ends
 * with dispose(), which removes whatever is still registered. Directories
 * registered with registerDirectory() are only removed when nothing but empty
 * directories remains inside them, so engine output is never touched. While armed, a
 * SIGINT aborts the scope's signal instead of terminating the process, so the
 * controller can unwind and clean up.
 *
 * Usage:
 *   const scope = new ArtifactScope();
 *   try {
 *     scope.arm();
 *     scope.register(designPath, 'cope1');
 *     ...
 *   } finally {
 *     scope.dispose();
 *   }
 */

import fs from 'fs';
import path from 'path';
import { CancelledError } from '../errors.js';
import { logInfo, logWarn } from '../fault-logger.js';

interface TrackedArtifact {
  label: string;
  createdAt: number;
}

export class ArtifactScope {
  private artifacts = new Map<string, TrackedArtifact>();
  private directories = new Map<string, TrackedArtifact>();
  private controller = new AbortController();
  private armed = false;

  private readonly onSigint = (): void => {
    logInfo('artifacts', `Interrupted with ${this.artifacts.size} artifact(s) pending`);
    this.abort(new CancelledError('Interrupted by user'));
  };

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get size(): number {
    return this.artifacts.size;
  }

  get isArmed(): boolean {
    return this.armed;
  }

  /** Paths still awaiting cleanup, in registration order */
  pending(): string[] {
    return Array.from(this.artifacts.keys());
  }

  register(artifactPath: string, label: string): void {
    this.artifacts.set(artifactPath, { label, createdAt: Date.now() });
  }

  /** Track a directory the scope created; dispose() removes it only while it holds no files. */
  registerDirectory(dirPath: string, label: string): void {
    this.directories.set(dirPath, { label, createdAt: Date.now() });
  }

  /** Remove one artifact now and stop tracking it. Returns false if removal failed. */
  release(artifactPath: string): boolean {
    const info = this.artifacts.get(artifactPath);
    if (!info) return true;
    this.artifacts.delete(artifactPath);
    return removeArtifact(artifactPath, info.label);
  }

  /** Remove everything still registered and disarm. Returns the paths that could not be removed. */
  dispose(): string[] {
    this.disarm();
    const failed: string[] = [];
    for (const artifactPath of this.pending()) {
      if (!this.release(artifactPath)) failed.push(artifactPath);
    }
    // Innermost first, so a nested registration is pruned before its parent
    for (const [dirPath, info] of Array.from(this.directories).reverse()) {
      this.directories.delete(dirPath);
      if (!pruneDirectory(dirPath, info.label)) failed.push(dirPath);
    }
    return failed;
  }

  abort(reason: Error): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  /** Route SIGINT into this scope's abort signal. */
  arm(): void {
    if (this.armed) return;
    this.armed = true;
    process.on('SIGINT', this.onSigint);
  }

  disarm(): void {
    if (!this.armed) return;
    this.armed = false;
    process.off('SIGINT', this.onSigint);
  }

  /** Throw the abort reason if the scope was aborted. */
  throwIfAborted(): void {
    const { signal } = this.controller;
    if (!signal.aborted) return;
    throw signal.reason instanceof Error ? signal.reason : new CancelledError();
  }
}

function removeArtifact(artifactPath: string, label: string): boolean {
  try {
    fs.rmSync(artifactPath, { recursive: true, force: true });
    logInfo('artifacts', `Removed ${label}: ${artifactPath}`);
    return true;
  } catch (error) {
    logWarn('artifacts', `Could not remove ${label}: ${artifactPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/** Remove `dir` if its tree holds only directories. */
function removeEmptyTree(dir: string): boolean {
  if (!fs.existsSync(dir)) return true;
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  const removed = entries.map((entry) => entry.isDirectory() && removeEmptyTree(path.join(dir, entry.name)));
  if (!removed.every(Boolean)) return false;
  fs.rmdirSync(dir);
  return true;
}

function pruneDirectory(dirPath: string, label: string): boolean {
  try {
    if (removeEmptyTree(dirPath)) logInfo('artifacts', `Removed ${label}: ${dirPath}`);
    return true;
  } catch (error) {
    logWarn('artifacts', `Could not remove ${label}: ${dirPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
