import { StorageError } from "../../core/entities/appError";

const connectionErrorCodes = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "CONNECT_TIMEOUT",
  "57P01",
]);

/**
 * Drivers put the SQLSTATE on `code`; some wrap the driver error in `cause`.
 */
const readErrorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }

  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }

  if ("cause" in error) {
    return readErrorCode(error.cause);
  }

  return undefined;
};

/**
 * Maps driver failures onto the storage taxonomy. SQLSTATE class 23 is an integrity
 * violation and class 08 a connection exception.
 */
export const toStorageError = (error: unknown, action: string): StorageError => {
  if (error instanceof StorageError) {
    return error;
  }

  const code = readErrorCode(error);
  const detail = error instanceof Error ? error.message : String(error);

  if (code?.startsWith("23")) {
    return new StorageError(
      "constraint_violation",
      `${action} violated a constraint: ${detail}`,
      code,
      { cause: error },
    );
  }

  if (code && (code.startsWith("08") || connectionErrorCodes.has(code))) {
    return new StorageError(
      "connection_lost",
      `${action} lost its database connection: ${detail}`,
      code,
      { cause: error },
    );
  }

  return new StorageError("unknown", `${action} failed: ${detail}`, code, {
    cause: error,
  });
};
