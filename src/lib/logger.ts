let verbose = false;

export function setVerbose(value: boolean): void {
  verbose = value;
}

// Diagnostics go to stderr so stdout stays clean for results.
export function log(message: string): void {
  console.error(message);
}

export function debug(message: string): void {
  if (verbose) console.error(message);
}
