import colors from 'ansi-colors';

export let VERBOSE = false;

export const setVerbose = (verbose: boolean) => {
  VERBOSE = verbose;
};

/**
 * Write a diagnostic line to stderr when verbose mode is enabled
 */
export function logDebug(scope: string, message: string): void {
  if (!VERBOSE) {
    return;
  }

  const now = new Date();
  if (process.stderr.isTTY) {
    console.error(
      colors.gray(now.toISOString()) +
        ' ' +
        colors.cyan(scope) +
        ' ' +
        colors.gray(message)
    );
  } else {
    console.error(`${now.toISOString()} ${scope} ${message}`);
  }
}
