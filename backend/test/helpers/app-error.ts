import { AppError } from '../../src/shared/http/errors';

/**
 * Awaits a promise that must reject with an AppError and returns that error.
 * Any other rejection is rethrown so the test fails with the real cause.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('Expected promise to reject with AppError');
}
