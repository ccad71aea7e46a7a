import figlet from 'figlet';
import chalk from 'chalk';
import { readPackageVersion } from '@quecat/core';

const VERSION = readPackageVersion(import.meta.url);

/**
 * Wrap text in a box with optional footer lines (fixed width based on main content)
 */
export function wrapInBox(text: string, footerLines: string[] = [], padding = 1): string {
  const lines = text.split('\n').filter(line => line.trim().length > 0);

  // Use only the main content (logo) to determine box width
  const maxLength = Math.max(...lines.map(line => line.length));

  const horizontalBorder = '─'.repeat(maxLength + padding * 2);
  const top = `┌${horizontalBorder}┐`;
  const bottom = `└${horizontalBorder}┘`;
  const pad = ' '.repeat(padding);

  const paddedLines = lines.map(line => `│${pad}${line.padEnd(maxLength)}${pad}│`);

  if (footerLines.length === 0) {
    return [top, ...paddedLines, bottom].join('\n');
  }

  // Footer lines are centered; longer ones are cut to the box width
  const footer = footerLines.map(line => {
    const clipped = line.slice(0, maxLength);
    const leftPad = Math.floor((maxLength - clipped.length) / 2);
    return `│${pad}${' '.repeat(leftPad)}${clipped.padEnd(maxLength - leftPad)}${pad}│`;
  });

  return [top, ...paddedLines, `├${horizontalBorder}┤`, ...footer, bottom].join('\n');
}

/**
 * Print the boxed ANSI Shadow banner to stderr, keeping stdout for command output
 */
export function showBanner(subtitle?: string): void {
  const banner = figlet.textSync('QUECAT', {
    font: 'ANSI Shadow',
    horizontalLayout: 'fitted',
    verticalLayout: 'fitted',
  });

  const footerLines: string[] = [];
  if (subtitle) {
    footerLines.push(subtitle);
  }
  footerLines.push(`v${VERSION}`);

  console.error(chalk.cyan(wrapInBox(banner.trim(), footerLines)));
  console.error();
}
