
import { createProgram } from './program.js';
import { handleError } from './utils.js';

// a reader that hangs up early surfaces as an EPIPE error on stdout
process.stdout.on('error', (err) => {
  handleError(err);
});

await createProgram().parseAsync();
