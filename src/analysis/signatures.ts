import type { Signature } from '../types.js';

/**
 * Signature tables for the pattern detectors.
 *
 * Order matters only for presentation: every signature is evaluated and every
 * match is kept, so overlapping rules produce several findings.
 *
 * Security and performance patterns run case-insensitively over the added
 * lines of a file. Breaking-change patterns run case-sensitively over the
 * whole patch in multi-line mode, because they have to see `-` lines.
 */

export const SECURITY_SIGNATURES: readonly Signature[] = [
  // SQL injection
  {
    pattern: /execute\s*\(.*\+.*\)/gi,
    severity: 'high',
    title: 'Potential SQL injection',
    suggestion: 'Use parameterized queries instead of string concatenation',
  },
  {
    pattern: /\.raw\s*\(.*\+.*\)/gi,
    severity: 'high',
    title: 'Potential SQL injection in raw query',
    suggestion: 'Use parameterized queries with placeholders',
  },
  {
    pattern: /["'][^"'\n]*\b(?:SELECT|INSERT|UPDATE|DELETE)\b[^"'\n]*["']\s*\+/gi,
    severity: 'high',
    title: 'SQL query built by string concatenation',
    suggestion: 'Use parameterized queries instead of string concatenation',
  },
  {
    pattern: /format\s*\(.*SELECT.*\)|\bf["'][^"'\n]*SELECT[^"'\n]*\{/gi,
    severity: 'high',
    title: 'SQL query with string formatting',
    suggestion: 'Use ORM or parameterized queries',
  },

  // Hard-coded credentials
  {
    pattern: /password\s*=\s*["'][^"']+["']/gi,
    severity: 'high',
    title: 'Hardcoded password detected',
    suggestion: 'Use environment variables for sensitive data',
  },
  {
    pattern: /api[_-]?key\s*=\s*["'][^"']+["']/gi,
    severity: 'high',
    title: 'Hardcoded API key detected',
    suggestion: 'Store API keys in environment variables',
  },
  {
    pattern: /secret\s*=\s*["'][^"']+["']/gi,
    severity: 'high',
    title: 'Hardcoded secret detected',
    suggestion: 'Use secure secret management',
  },
  {
    pattern: /token\s*=\s*["'][a-zA-Z0-9]{20,}["']/gi,
    severity: 'high',
    title: 'Hardcoded token detected',
    suggestion: 'Store tokens securely in environment variables',
  },

  // XSS and code evaluation
  {
    pattern: /innerHTML\s*=/gi,
    severity: 'medium',
    title: 'Potential XSS via innerHTML',
    suggestion: 'Use textContent or sanitize input before setting innerHTML',
  },
  {
    pattern: /dangerouslySetInnerHTML/gi,
    severity: 'medium',
    title: 'Using dangerouslySetInnerHTML',
    suggestion: 'Ensure content is properly sanitized',
  },
  {
    pattern: /eval\s*\(/gi,
    severity: 'high',
    title: 'Using eval() - security risk',
    suggestion: 'Avoid eval(), use safer alternatives like JSON.parse()',
  },

  // Deserialization
  {
    pattern: /pickle\.loads?\s*\(/gi,
    severity: 'high',
    title: 'Unsafe deserialization with pickle',
    suggestion: 'Use safer serialization formats like JSON',
  },
  {
    pattern: /yaml\.load\s*\((?!.*Loader)/gi,
    severity: 'medium',
    title: 'Unsafe YAML loading',
    suggestion: 'Use yaml.safe_load() instead of yaml.load()',
  },

  // Command injection
  {
    pattern: /os\.system\s*\(.*\+/gi,
    severity: 'high',
    title: 'Potential command injection',
    suggestion: 'Use subprocess with argument list instead of shell=True',
  },
  {
    pattern: /subprocess\..*shell\s*=\s*True/gi,
    severity: 'medium',
    title: 'Shell=True in subprocess',
    suggestion: 'Avoid shell=True, use argument list for safety',
  },

  // Weak hashing
  {
    pattern: /md5/gi,
    severity: 'medium',
    title: 'MD5 is cryptographically weak',
    suggestion: 'Use SHA-256 or stronger hash algorithms',
  },
  {
    pattern: /sha-?1(?!\d)/gi,
    severity: 'medium',
    title: 'SHA-1 is deprecated',
    suggestion: 'Use SHA-256 or stronger hash algorithms',
  },
];

export const BREAKING_CHANGE_SIGNATURES: readonly Signature[] = [
  {
    pattern: /^-\s*(?:async\s+)?(?:def|function)\s+([a-zA-Z_$][a-zA-Z0-9_$]*)\s*\(/gm,
    severity: 'medium',
    title: 'Public method removed',
    suggestion: 'This may break existing code',
  },
  {
    pattern: /^-\s*class\s+([a-zA-Z_][a-zA-Z0-9_]*)/gm,
    severity: 'high',
    title: 'Class removed',
    suggestion: 'This will break code depending on this class',
  },
  {
    pattern: /^-\s*export\s+(function|class|const|let|var)/gm,
    severity: 'medium',
    title: 'Export removed',
    suggestion: 'This may break imports in other files',
  },
  {
    // Old and new definition of the same name on adjacent lines. Line spans use
    // `[^\n]*` so CRLF patches match too.
    pattern: /def\s+([a-zA-Z_][a-zA-Z0-9_]*)\s*\([^)]*\):[^\n]*\n[^\n]*def\s+\1\s*\([^)]*\):/gm,
    severity: 'medium',
    title: 'Function signature changed',
    suggestion: 'Verify all callers are updated',
  },
];

export const PERFORMANCE_SIGNATURES: readonly Signature[] = [
  {
    pattern: /\.all\(\)(?:[^\n]*\n){0,3}?[^\n]*\bfor\b[^\n]*\bin\b/gi,
    severity: 'medium',
    title: 'N+1 query pattern detected',
    suggestion: 'Consider using select_related() or prefetch_related()',
  },
  {
    pattern: /for\s+\w+\s+in\s+range\s*\(\s*\d{4,}/gi,
    severity: 'medium',
    title: 'Large loop iteration',
    suggestion: 'Consider pagination or batch processing',
  },
  {
    pattern: /while\s+True:/gi,
    severity: 'low',
    title: 'Infinite loop detected',
    suggestion: "Ensure there's a proper exit condition",
  },
  {
    pattern: /sleep\s*\(\s*[0-9]+\s*\)/gi,
    severity: 'low',
    title: 'Sleep call in code',
    suggestion: 'Consider async/await or event-driven approach',
  },
];
