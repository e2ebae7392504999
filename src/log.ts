// All diagnostics go to stderr; stdout stays free for anything piped out.
const TAG = '[GUIDE]';

function debugEnabled(): boolean {
  return process.env.GUIDE_DEBUG !== '0';
}

export function glog(...args: unknown[]): void {
  console.error(TAG, ...args);
}

export function gwarn(...args: unknown[]): void {
  console.error(TAG, 'warn:', ...args);
}

export function gerr(...args: unknown[]): void {
  console.error(TAG, 'error:', ...args);
}

export function gdbg(...args: unknown[]): void {
  if (debugEnabled()) console.error(TAG, ...args);
}
