export function setTerminalTitle(title: string): void {
  if (!process.stdout.isTTY) {
    return;
  }
  process.stdout.write(`\x1b]0;${title}\x07`);
}

export function clearTerminal(): void {
  if (!process.stdout.isTTY) {
    return;
  }

  process.stdout.write('\x1b[2J');
  process.stdout.write('\x1b[H');
}
