/**
 * Live execution logger for healwright.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

let quiet = false;

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  if (quiet) return;
  process.stderr.write(message + '\n');
}

export function setQuiet(value: boolean): void {
  quiet = value;
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function attempt(ordinal: number, maxAttempts: number, version: number | null): void {
  const script = version === null ? 'no script' : `script v${String(version)}`;
  write(`▶️  Attempt ${String(ordinal)}/${String(maxAttempts)} (${script})`);
}

export function attemptResult(ordinal: number, success: boolean, message: string): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} Attempt ${String(ordinal)}: ${message}`);
}

export function transition(from: string, to: string): void {
  write(`   ${from} → ${to}`);
}

export function diagnosis(category: string, confidence: number, summary: string): void {
  write(`🔍 Diagnosis: ${category} (${String(Math.round(confidence * 100))}%) ${summary}`);
}

export function repair(message: string): void {
  write(`🔧 ${message}`);
}

export function spend(message: string): void {
  write(`💰 ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}
