export const MAX_LOG_LINE = 10000;

/**
 * Escape control characters so a remote stderr line cannot forge log entries.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, MAX_LOG_LINE);
}

/**
 * Redact secrets from anything headed for a log or an error message.
 * `secrets` are literal values known to the caller (e.g. an SSH password).
 */
export function redactSensitiveInfo(s: string, secrets: readonly string[] = []): string {
  if (!s) return "";

  let result = s;
  for (const secret of secrets) {
    if (secret.length > 0) result = result.split(secret).join("***");
  }

  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/SSHPASS=\S+/g, "SSHPASS=***");

  return result;
}

/**
 * Reject names that would escape a directory when joined onto it.
 * @throws Error if the component is empty or contains a separator or `..`
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }
  if (component.includes("..") || component.includes("/") || component.includes("\\") || component.includes("\0")) {
    throw new Error(`Invalid path component: ${component}`);
  }
  return component.trim();
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** POSIX single-quote a word for a remote shell. */
export function shellQuote(word: string): string {
  if (word.length > 0 && SHELL_SAFE.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(argv: readonly string[]): string {
  return argv.map(shellQuote).join(" ");
}
