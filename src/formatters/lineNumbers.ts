export function splitLines(content: string): string[] {
  const lines = content.split('\n');
  // A trailing newline ends the last line; it does not start another one
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function addLineNumbers(content: string): string {
  const lines = splitLines(content);
  const width = String(lines.length).length;
  return lines.map((line, i) => `${String(i + 1).padStart(width)}  ${line}`).join('\n');
}
