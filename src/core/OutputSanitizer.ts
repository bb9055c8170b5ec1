/**
 * OutputSanitizer - Redacts secrets before prompts, responses and tool
 * output reach the audit log.
 *
 * Prompts embed whole source files and test output, so credentials that
 * live in the sandbox (settings modules, fixtures, .env readers) would
 * otherwise be copied verbatim into the log.
 */

export interface SanitizationPattern {
  regex: RegExp;
  replacement: string;
  description: string;
}

const DEFAULT_PATTERNS: SanitizationPattern[] = [
  {
    regex: /sk-ant-[A-Za-z0-9-_]{40,}/g,
    replacement: 'sk-ant-***REDACTED***',
    description: 'Anthropic API key'
  },
  {
    regex: /sk-proj-[A-Za-z0-9-_]{40,}/g,
    replacement: 'sk-proj-***REDACTED***',
    description: 'OpenAI project API key'
  },
  {
    regex: /sk-[A-Za-z0-9-_]{40,}/g,
    replacement: 'sk-***REDACTED***',
    description: 'Generic sk- API key'
  },
  {
    regex: /gsk_[A-Za-z0-9]{40,}/g,
    replacement: 'gsk_***REDACTED***',
    description: 'Groq API key'
  },
  {
    regex: /AKIA[A-Z0-9]{16}/g,
    replacement: 'AKIA***REDACTED***',
    description: 'AWS Access Key ID'
  },
  {
    regex: /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
    replacement: 'Bearer ***REDACTED***',
    description: 'Bearer token'
  },
  {
    regex: /-----BEGIN[^-]+PRIVATE KEY-----[\s\S]+?-----END[^-]+PRIVATE KEY-----/g,
    replacement: '[PRIVATE_KEY_REDACTED]',
    description: 'Private key (PEM format)'
  },
  {
    regex: /:\/\/([^:/\s]+):([^@\s]{8,})@/g,
    replacement: '://***:***@',
    description: 'Connection string credentials'
  },
  {
    regex: /(password|passwd|secret|api_key|apikey|token|access_token)\s*[:=]\s*['"][^'"]{8,}['"]/gi,
    replacement: '$1: "***REDACTED***"',
    description: 'Inline secret assignment'
  },
  {
    regex: /(ANTHROPIC_API_KEY|OPENAI_API_KEY|GROQ_API_KEY|AWS_SECRET_ACCESS_KEY)\s*=\s*\S+/g,
    replacement: '$1=***REDACTED***',
    description: 'Environment variable'
  }
];

export class OutputSanitizer {
  private patterns: SanitizationPattern[];

  constructor(extraPatterns: SanitizationPattern[] = []) {
    this.patterns = [...DEFAULT_PATTERNS, ...extraPatterns];
  }

  sanitize(text: string): string {
    let sanitized = text;
    for (const pattern of this.patterns) {
      sanitized = sanitized.replace(pattern.regex, pattern.replacement);
    }
    return sanitized;
  }

  /**
   * Sanitize every string inside a JSON-like value
   */
  sanitizeValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.sanitize(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.sanitizeValue(item));
    }
    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.sanitizeValue(entry);
      }
      return result;
    }
    return value;
  }

  getPatterns(): SanitizationPattern[] {
    return [...this.patterns];
  }
}

let sanitizerInstance: OutputSanitizer | null = null;

export function getSanitizer(): OutputSanitizer {
  if (!sanitizerInstance) {
    sanitizerInstance = new OutputSanitizer();
  }
  return sanitizerInstance;
}

export function redactSecrets(text: string): string {
  return getSanitizer().sanitize(text);
}
