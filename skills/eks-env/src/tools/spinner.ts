/**
 * Spinner and elapsed-time ticker for commands that run in the foreground.
 * Both only draw when stderr is a TTY; piped output gets plain lines instead.
 */

const LINE_WIDTH = 80;
const PREFIX_MAX_LEN = 60;
const FRAMES = ["|", "/", "-", "\\"];

let spinnerInterval: NodeJS.Timeout | null = null;
let tickerInterval: NodeJS.Timeout | null = null;
let tickerLine = "";

export function isInteractive(): boolean {
  return typeof process.stderr.isTTY === "boolean" && process.stderr.isTTY;
}

function clearLine(width = LINE_WIDTH): void {
  process.stderr.write(`\r${" ".repeat(width)}\r`);
}

export function startSpinner(message?: string): void {
  if (!isInteractive()) return;
  if (spinnerInterval) stopSpinner();

  let frame = 0;
  let prefix = message ? `${message} ` : "";
  if (prefix.length > PREFIX_MAX_LEN) {
    prefix = prefix.slice(0, PREFIX_MAX_LEN - 2) + ".. ";
  }

  spinnerInterval = setInterval(() => {
    process.stderr.write(`\r${`${prefix}${FRAMES[frame]}`.padEnd(LINE_WIDTH)}\r`);
    frame = (frame + 1) % FRAMES.length;
  }, 100);
}

export function stopSpinner(): void {
  if (!spinnerInterval) return;
  clearInterval(spinnerInterval);
  spinnerInterval = null;
  if (isInteractive()) clearLine();
}

/**
 * Rewrites "<action>... [Xm Ys elapsed]" once a second until stopTicker().
 */
export function startTicker(action: string): void {
  if (!isInteractive()) return;
  if (tickerInterval) stopTicker();

  const startTime = Date.now();
  tickerInterval = setInterval(() => {
    tickerLine = `   ⏳ ${action}... [${formatElapsed(Date.now() - startTime)} elapsed]`;
    process.stderr.write(`\r${tickerLine}${" ".repeat(10)}\r`);
  }, 1000);
}

/**
 * Blank the ticker line so a forwarded output line can be printed cleanly.
 */
export function clearTicker(): void {
  if (tickerInterval && tickerLine) clearLine(tickerLine.length + 15);
}

export function stopTicker(): void {
  if (!tickerInterval) return;
  clearInterval(tickerInterval);
  clearTicker();
  tickerInterval = null;
  tickerLine = "";
}

export function formatElapsed(ms: number): string {
  const total = Math.floor(ms / 1000);
  return `${Math.floor(total / 60)}m ${total % 60}s`;
}
