export type SanitizeResult =
  | { ok: true; text: string; truncated: boolean }
  | { ok: false; reason: string };

// Prompt injection and manipulation phrases
const INJECTION_PATTERNS = [
  // Instruction smuggling
  /ignore\s+(previous|all|my\s+)?\s*instructions/i,
  /system\s+(prompt|override|instruction)/i,
  /\[SYSTEM\]/i,
  /\[INST\]/i,
  /<<SYS>>/i,

  // Rule evasion
  /bypass\s+(safety|filter|guard|security)/i,
  /disregard\s+(all|previous|above|your)\s*(instructions|rules|directives)?/i,
  /forget\s+(previous|all|your)\s*(instructions|rules|context)?/i,
  /override\s+(previous|all|safety|security)\s*(instructions|rules|protocol)?/i,

  // Exfiltration
  /reveal\s+(your|the)\s+(prompt|instruction|rule)/i,

  // Authority escalation
  /admin\s+mode/i,
  /developer\s+mode/i
];

const HTML_TAG_PATTERN = /<[^>]*>/g;

// Keeps tab, newline and carriage return
// eslint-disable-next-line no-control-regex
const CONTROL_CHAR_PATTERN = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g;

/**
 * Clean an untrusted mission briefing before it reaches the commander.
 * Injection phrases are checked after tags and control characters are
 * stripped, so neither can split a phrase past the check.
 */
export function sanitizeMission(raw: string, maxChars: number): SanitizeResult {
  let text = raw.trim();
  if (!text) {
    return { ok: false, reason: 'Mission text is empty' };
  }

  const truncated = text.length > maxChars;
  if (truncated) {
    text = text.slice(0, maxChars);
  }

  text = text.replace(HTML_TAG_PATTERN, '').replace(CONTROL_CHAR_PATTERN, '');

  for (const pattern of INJECTION_PATTERNS) {
    if (pattern.test(text)) {
      return { ok: false, reason: 'Potential prompt injection detected' };
    }
  }

  if (!text.trim()) {
    return { ok: false, reason: 'Mission text is empty after sanitization' };
  }

  return { ok: true, text, truncated };
}
