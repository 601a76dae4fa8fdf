/**
 * Deny-list applied to every string argument before a tool runs.
 *
 * Patterns cover three families: code-execution primitives, filesystem escapes and
 * destructive shell commands. Matching is case-insensitive.
 */

export interface DangerousPattern {
  name: string;
  pattern: RegExp;
}

export const DANGEROUS_PATTERNS: readonly DangerousPattern[] = [
  // Code execution
  { name: 'import statement', pattern: /\bimport\s+[A-Za-z_][\w.]*/i },
  { name: 'from-import statement', pattern: /\bfrom\s+[A-Za-z_][\w.]*\s+import\b/i },
  { name: 'dynamic import', pattern: /\b__import__\s*\(/i },
  { name: 'eval call', pattern: /\beval\s*\(/i },
  { name: 'exec call', pattern: /\b(?:exec|execfile|execSync|spawn|spawnSync)\s*\(/i },
  { name: 'compile call', pattern: /\bcompile\s*\(/i },
  { name: 'function constructor', pattern: /\bnew\s+Function\s*\(/ },
  { name: 'require call', pattern: /\brequire\s*\(/i },
  { name: 'child process', pattern: /\bchild_process\b/i },
  { name: 'process control', pattern: /\bprocess\.(?:exit|kill|binding)\b/i },
  { name: 'file open', pattern: /\b(?:open|file)\s*\(/i },
  { name: 'interactive input', pattern: /\b(?:raw_)?input\s*\(/i },
  // Filesystem escape
  { name: 'parent directory traversal', pattern: /\.\.[\\/]/ },
  { name: 'sensitive system path', pattern: /\/etc\/(?:passwd|shadow)\b/i },
  // Destructive shell
  { name: 'recursive delete', pattern: /\brm\s+-[a-z]*r[a-z]*f|\brm\s+-[a-z]*f[a-z]*r/i },
  { name: 'windows delete', pattern: /\b(?:del|rd|rmdir)\s+\/[a-z]/i },
  { name: 'disk format', pattern: /\b(?:format\s+[a-z]:|mkfs(?:\.\w+)?\b)/i },
  { name: 'raw disk write', pattern: /\bdd\s+if=|>\s*\/dev\/sd[a-z]/i },
  { name: 'fork bomb', pattern: /:\(\)\s*\{\s*:\|:&\s*\};:/ },
];

export interface DangerousPatternMatch {
  field: string;
  pattern: string;
}

function joinPath(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
}

/**
 * Scan every string reachable from `value`, nested arrays and objects included.
 *
 * @returns The first match with its field path, or null when nothing matches.
 */
export function findDangerousPattern(value: unknown, path = ''): DangerousPatternMatch | null {
  if (typeof value === 'string') {
    const hit = DANGEROUS_PATTERNS.find((entry) => entry.pattern.test(value));
    return hit ? { field: path || '(root)', pattern: hit.name } : null;
  }

  if (Array.isArray(value)) {
    for (let index = 0; index < value.length; index++) {
      const match = findDangerousPattern(value[index], joinPath(path, index));
      if (match) return match;
    }
    return null;
  }

  if (value !== null && typeof value === 'object') {
    for (const [key, nested] of Object.entries(value)) {
      const match = findDangerousPattern(nested, joinPath(path, key));
      if (match) return match;
    }
  }

  return null;
}
