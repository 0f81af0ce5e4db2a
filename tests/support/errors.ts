import { AppError } from "../../src/infra/app-error.js";

export async function captureAppError(operation: Promise<unknown>): Promise<AppError> {
  try {
    await operation;
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the operation to fail with an AppError");
}
