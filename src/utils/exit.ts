/**
 * Wrappable process.exit so commands can be driven from tests.
 * Tests swap `cliExit` for a function that throws instead of exiting.
 */
export let cliExit: (code?: number) => never = (code = 0) => {
  process.exit(code);
};

export function setCliExit(fn: (code?: number) => never): void {
  cliExit = fn;
}
