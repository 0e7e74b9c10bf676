/**
 * Output formatting for the maintenance CLIs.
 */

import { colors } from "./colors";

export interface SeparatorOptions {
  /**
   * Character to use for separator (default: "━")
   */
  character?: string;
  /**
   * Length of separator (default: 50)
   */
  length?: number;
}

export interface SummaryOptions {
  title: string;
  items: Array<{ label: string; value: string | number }>;
  /**
   * Whether to show a separator after (default: true)
   */
  showSeparator?: boolean;
}

export class OutputFormatter {
  private static readonly DEFAULT_SEPARATOR_LENGTH = 50;
  private static readonly DEFAULT_SEPARATOR_CHAR = "━";

  static separator(options: SeparatorOptions = {}): string {
    const char = options.character || this.DEFAULT_SEPARATOR_CHAR;
    const length = options.length || this.DEFAULT_SEPARATOR_LENGTH;
    return char.repeat(length);
  }

  static header(text: string, emoji?: string): string {
    const prefix = emoji ? `${emoji} ` : "";
    return colors.header(`${prefix}${text}`);
  }

  static success(message: string): string {
    return colors.success(`✅ ${message}`);
  }

  static warning(message: string): string {
    return colors.warning(`⚠️  ${message}`);
  }

  static info(message: string): string {
    return colors.info(`ℹ️  ${message}`);
  }

  /**
   * Title, separator, then one aligned `label: value` line per item
   */
  static summary(options: SummaryOptions): string {
    const lines: string[] = [];

    lines.push(colors.header(options.title));
    lines.push(colors.dim(this.separator()));

    const width = Math.max(0, ...options.items.map((item) => item.label.length));
    for (const item of options.items) {
      lines.push(`   ${colors.key(`${item.label}:`.padEnd(width + 1))} ${colors.value(String(item.value))}`);
    }

    if (options.showSeparator !== false) {
      lines.push(colors.dim(this.separator()));
    }

    return lines.join("\n");
  }

  /**
   * @param label - Singular form, pluralized with "s" when count !== 1
   */
  static count(count: number, label: string): string {
    const plural = count !== 1 ? `${label}s` : label;
    return `${count} ${plural}`;
  }

  /**
   * @returns e.g. "850ms", "45s", "2m 30s"
   */
  static duration(ms: number): string {
    if (ms < 1000) {
      return `${Math.round(ms)}ms`;
    }

    const seconds = Math.floor(ms / 1000);
    if (seconds < 60) {
      return `${seconds}s`;
    }

    const minutes = Math.floor(seconds / 60);
    const remainingSeconds = seconds % 60;
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }
}
