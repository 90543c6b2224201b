/**
 * Patch comparison
 *
 * Deciding whether a commit is a pure rebase of a patch set comes down to
 * comparing the two diffs against their own parents. The comparison goes
 * through a PatchDiffer so the diff source can be swapped.
 */

/**
 * Produces the diff of a commit against a parent
 */
export interface PatchDiffer {
  diff(commit: string, parent: string): Promise<string>;
}

/**
 * Source of raw diffs, e.g. a local repository
 */
export interface DiffSource {
  diff(commit: string, parent: string): string;
}

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@(.*)$/;

/**
 * Strip the parts of a diff that depend on the base:
 * blob ids on `index` lines and line numbers in hunk headers.
 * Anything before the first `diff --git` (mail headers of a format-patch)
 * and a trailing signature are dropped too.
 */
export function normalizePatch(patch: string): string {
  const lines = patch.replace(/\r\n/g, '\n').split('\n');
  const out: string[] = [];
  let started = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!started) {
      if (!line.startsWith('diff --git ')) continue;
      started = true;
    }

    // format-patch signature: "-- " then the git version
    if (line === '-- ' && lines.slice(i + 1).filter(l => l !== '').length <= 1) break;
    if (line.startsWith('index ')) continue;

    const hunk = line.match(HUNK_HEADER);
    if (hunk) {
      out.push(`@@${hunk[1]}`);
      continue;
    }

    out.push(line);
  }

  while (out.length > 0 && out[out.length - 1] === '') {
    out.pop();
  }

  return out.join('\n');
}

/**
 * True when both diffs describe the same change
 */
export function samePatch(a: string, b: string): boolean {
  return normalizePatch(a) === normalizePatch(b);
}

/**
 * Differ backed by a local repository; results are normalized and cached
 * per (commit, parent) pair for the lifetime of the differ.
 */
export class LocalPatchDiffer implements PatchDiffer {
  private cache = new Map<string, string>();

  constructor(private source: DiffSource) {}

  async diff(commit: string, parent: string): Promise<string> {
    const key = `${parent}..${commit}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const patch = normalizePatch(this.source.diff(commit, parent));
    this.cache.set(key, patch);
    return patch;
  }
}
