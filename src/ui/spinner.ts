import ora, { type Ora } from 'ora';

export function startSpinner(text: string, silent = false): Ora {
  return ora({ text, isSilent: silent }).start();
}

/** Runs synchronous work behind a spinner; the spinner fails if it throws. */
export function withSpinner<T>(text: string, fn: () => T, silent = false): T {
  const spinner = startSpinner(text, silent);
  try {
    const result = fn();
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}
