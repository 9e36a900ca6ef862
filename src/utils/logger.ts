let verbose = false;

export function setVerbose(value: boolean): void {
  verbose = value;
}

export function log(message: string): void {
  if (verbose) {
    // eslint-disable-next-line no-console
    console.error(`[${new Date().toISOString()}] ${message}`);
  }
}
