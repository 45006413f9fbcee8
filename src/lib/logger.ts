const RESET = "\x1b[0m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const MAGENTA = "\x1b[35m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";

function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

let capturing = false;
let captured: string[] = [];
let verbose = Boolean(process.env["MODKEEP_DEBUG"]);

/**
 * Writes one line. `plain` is what capture mode records, `styled` what a
 * terminal gets.
 */
function emit(plain: string, styled: string, stream: "out" | "err" = "out"): void {
  if (capturing) {
    captured.push(stripAnsi(plain));
    return;
  }
  if (stream === "err") {
    console.error(styled);
  } else {
    console.log(styled);
  }
}

function tagged(tag: string, color: string, msg: string, stream: "out" | "err" = "out"): void {
  emit(`${tag} ${msg}`, `${color}${tag}${RESET} ${msg}`, stream);
}

export const logger = {
  capture() {
    capturing = true;
    captured = [];
  },

  flush(): string[] {
    const messages = captured;
    captured = [];
    capturing = false;
    return messages;
  },

  isCapturing(): boolean {
    return capturing;
  },

  setVerbose(on: boolean) {
    verbose = on;
  },

  isVerbose(): boolean {
    return verbose;
  },

  info(msg: string) {
    tagged("info", CYAN, msg);
  },

  success(msg: string) {
    tagged("✓", GREEN, msg);
  },

  warn(msg: string) {
    tagged("warn", YELLOW, msg);
  },

  error(msg: string) {
    tagged("error", RED, msg, "err");
  },

  /** Diagnostic detail; dropped unless verbose logging is on. */
  debug(msg: string) {
    if (!verbose) return;
    tagged("debug", MAGENTA, msg);
  },

  dim(msg: string) {
    emit(msg, `${DIM}${msg}${RESET}`);
  },

  bold(msg: string) {
    emit(msg, `${BOLD}${msg}${RESET}`);
  },

  table(headers: string[], rows: string[][]) {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    );
    const pad = (cells: string[]) =>
      cells.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join("  ");

    const header = pad(headers.map((h) => h.toUpperCase()));
    emit(`  ${header}`, `  ${DIM}${header}${RESET}`);
    for (const row of rows) {
      const line = `  ${pad(row)}`;
      emit(line, line);
    }
  },

  blank() {
    emit("", "");
  },
};
