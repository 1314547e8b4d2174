/**
 * Terminal rendering of exchanges.
 */

import {
  colorLines,
  createPalette,
  formatLocalTimestamp,
  isJsonRpcErrorResponse,
  packetLabel,
  type HeaderSnapshot,
  type PacketType,
  type Palette,
} from "@json-rpc-snoop/core";

export interface PresenterOptions {
  color: boolean;
  logHeaders: boolean;
  /** Output sink (default: stdout) */
  write?: (text: string) => void;
  /** Clock used for timestamps */
  now?: () => Date;
}

/** One packet ready to be printed */
export interface PacketEntry {
  packet: PacketType;
  /** Full display JSON, used to pick the color */
  json: string;
  /** Text to print below the header line; null prints the header line only */
  body: string | null;
  label: string;
  headers: HeaderSnapshot;
  /** HTTP status, responses only */
  status?: number | undefined;
}

export class Presenter {
  private readonly palette: Palette;
  private readonly logHeaders: boolean;
  private readonly write: (text: string) => void;
  private readonly now: () => Date;

  constructor(options: PresenterOptions) {
    this.palette = createPalette(options.color);
    this.logHeaders = options.logHeaders;
    this.write =
      options.write ??
      ((text: string) => {
        process.stdout.write(text);
      });
    this.now = options.now ?? (() => new Date());
  }

  /** Body color for a packet */
  colorFor(packet: PacketType, json: string): string {
    switch (packet.kind) {
      case "request":
        return this.palette.info;
      case "response":
        return isJsonRpcErrorResponse(json)
          ? this.palette.error
          : this.palette.success;
      case "request-dropped":
      case "response-dropped":
        return this.palette.muted;
    }
  }

  format(entry: PacketEntry): string {
    let header = `${formatLocalTimestamp(this.now())} ${packetLabel(entry.packet)}`;
    if (entry.status !== undefined) {
      header += ` (status ${entry.status})`;
    }
    if (entry.label.length > 0 && entry.label !== "/") {
      header += ` ${entry.label}`;
    }

    let output = `${header}\n`;

    if (this.logHeaders && entry.headers.length > 0) {
      output += "  headers:\n";
      for (const [name, value] of entry.headers) {
        output += `    ${name}: ${value}\n`;
      }
    }

    if (entry.body !== null) {
      output += colorLines(
        entry.body,
        this.colorFor(entry.packet, entry.json),
        this.palette.reset
      );
    }

    return output;
  }

  formatFailure(body: string, status: number): string {
    const header = `${formatLocalTimestamp(this.now())} ERROR (status ${status})`;
    return `${header}\n${colorLines(body, this.palette.error, this.palette.reset)}`;
  }

  formatWarning(message: string): string {
    return colorLines(
      `${formatLocalTimestamp(this.now())} WARNING ${message}`,
      this.palette.warning,
      this.palette.reset
    );
  }

  /** Print a request or response */
  packet(entry: PacketEntry): void {
    this.write(this.format(entry));
  }

  /** Print a synthesized failure response */
  failure(body: string, status: number): void {
    this.write(this.formatFailure(body, status));
  }

  warning(message: string): void {
    this.write(this.formatWarning(message));
  }
}
