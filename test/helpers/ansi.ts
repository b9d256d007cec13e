/** Remove the SGR color sequences the CLI writes. */
export function stripAnsi(input: string): string {
  return input.replace(/\u001B\[[0-9;]*m/g, '');
}
