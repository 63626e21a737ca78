// CSI sequences, OSC sequences terminated by BEL or ST, and two-byte escapes
const ANSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)|\x1b[@-Z\\-_]/g;
// C0 controls except tab and newline, plus DEL
const CONTROL_PATTERN = /[\x00-\x08\x0b-\x1f\x7f]/g;

/**
 * Normalizes raw shell output: ANSI escapes and control characters removed,
 * line endings unified, every line trimmed and blank lines dropped.
 */
export function cleanOutput(raw: string): string {
  return raw
    .replace(ANSI_PATTERN, '')
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_PATTERN, '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/** `24:A1:86:1D:DA:90` -> `24a1861dda90` */
export function normalizeHardwareId(hardwareId: string): string {
  return hardwareId.replace(/[\s:._-]/g, '').toLowerCase();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m${Math.round(seconds % 60)}s`;
}
