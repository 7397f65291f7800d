/**
 * Reading pdflatex terminal output
 */

const TAIL_LINES = 15;

/**
 * Pull the "! ..." error lines and their "l.<n>" source context out of a
 * compiler transcript. Falls back to the last lines when no marker is found.
 */
export function extractLatexErrors(output: string): string {
  const lines = output.split(/\r?\n/);
  const picked: string[] = [];

  lines.forEach((line, index) => {
    if (!line.startsWith('!')) {
      return;
    }
    picked.push(line);
    const context = lines.slice(index + 1, index + 6).find(candidate => /^l\.\d+/.test(candidate));
    if (context) {
      picked.push(context);
    }
  });

  if (picked.length > 0) {
    return picked.join('\n');
  }
  return lines
    .filter(line => line.trim().length > 0)
    .slice(-TAIL_LINES)
    .join('\n');
}

/**
 * Human-friendly megabytes with two decimals
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
