/**
 * Parses a hex dump ("90 3C 64 ...") into bytes. Anything after `#` on a
 * line is a comment.
 */
export function parseHexDump(text: string): number[] {
  const bytes: number[] = [];
  for (const line of text.split("\n")) {
    const content = line.split("#")[0] ?? "";
    for (const token of content.trim().split(/\s+/)) {
      if (token === "") continue;
      if (!/^[0-9a-fA-F]{1,2}$/.test(token)) {
        throw new Error(`Invalid hex byte: ${token}`);
      }
      bytes.push(Number.parseInt(token, 16));
    }
  }
  return bytes;
}
