import { handleError } from '../../utils.js';

export async function runCommandAction(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    handleError(err);
  }
}
