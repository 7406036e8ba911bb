/**
 * Split document text into lines with surrounding spaces and line terminators
 * removed. Tabs are kept: they delimit cells, including empty edge cells.
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/).map(line => line.replace(/^[ \r]+|[ \r]+$/g, ''));
}
