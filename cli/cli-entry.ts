/**
 * Main entry point for the tagweave CLI application.
 */
import { main } from './index';

export { main };

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
