/** Verbose diagnostics go to stderr so they never mix with status output */
export function debugLog(message: string, verbose: boolean): void {
  if (verbose) console.error(`[toolfetch] ${message}`);
}
