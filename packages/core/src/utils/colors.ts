/**
 * ANSI foreground colors for terminal output.
 */

const ESC = "\u001b[";

export interface Palette {
  /** Requests */
  info: string;
  /** Successful responses */
  success: string;
  /** Error responses and synthesized failures */
  error: string;
  /** Dropped packets */
  muted: string;
  /** Warnings */
  warning: string;
  /** Default foreground */
  reset: string;
}

const ANSI_PALETTE: Palette = Object.freeze({
  info: `${ESC}36m`,
  success: `${ESC}32m`,
  error: `${ESC}31m`,
  muted: `${ESC}90m`,
  warning: `${ESC}33m`,
  reset: `${ESC}39m`,
});

const EMPTY_PALETTE: Palette = Object.freeze({
  info: "",
  success: "",
  error: "",
  muted: "",
  warning: "",
  reset: "",
});

/** Palette for the given color setting; every entry is empty when disabled */
export function createPalette(enabled: boolean): Palette {
  return enabled ? ANSI_PALETTE : EMPTY_PALETTE;
}

/**
 * Wrap every line of a multi-line string in `color` ... `reset`.
 * Each line carries its own color so pagers like `less` keep it per line.
 * The result always ends with a newline.
 */
export function colorLines(text: string, color: string, reset: string): string {
  let result = "";
  for (const line of text.split("\n")) {
    result += `${color}${line}${reset}\n`;
  }
  return result;
}
