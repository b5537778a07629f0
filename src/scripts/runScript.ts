import { ConfigError } from '../infra/config.js';

/**
 * Run a script body and turn its outcome into the process exit code.
 */
export function runScript(name: string, main: () => Promise<number>): void {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      if (error instanceof ConfigError) {
        console.error(error.message);
      } else {
        console.error(`${name} failed:`, error);
      }
      process.exitCode = 1;
    }
  );
}
