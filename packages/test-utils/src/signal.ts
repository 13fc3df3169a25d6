import { SignaledError } from "@faultline/errors";

/**
 * Await a frame expected to fail and return the signal it re-raised.
 * Any other outcome fails the test.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<SignaledError> {
  try {
    await promise;
  } catch (error: unknown) {
    if (error instanceof SignaledError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the frame to fail, but it resolved");
}
