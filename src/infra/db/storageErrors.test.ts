import { describe, expect, it } from "vitest";
import { StorageError } from "../../core/entities/appError";
import { toStorageError } from "./storageErrors";

const driverError = (message: string, code: string) =>
  Object.assign(new Error(message), { code });

describe("toStorageError", () => {
  it("maps integrity violations", () => {
    const error = toStorageError(
      driverError("duplicate key value", "23505"),
      "Creating stocks rows",
    );

    expect(error.kind).toBe("constraint_violation");
    expect(error.sqlState).toBe("23505");
    expect(error.message).toBe(
      "Creating stocks rows violated a constraint: duplicate key value",
    );
  });

  it("reads the code from a wrapped cause", () => {
    const wrapped = new Error("query failed", {
      cause: driverError("connection failure", "08006"),
    });

    expect(toStorageError(wrapped, "Querying stocks").kind).toBe(
      "connection_lost",
    );
  });

  it("maps socket-level failures to connection_lost", () => {
    expect(
      toStorageError(driverError("refused", "ECONNREFUSED"), "Querying stocks")
        .kind,
    ).toBe("connection_lost");
  });

  it("falls back to unknown and keeps existing storage errors", () => {
    const unknown = toStorageError("boom", "Counting stocks");
    expect(unknown.kind).toBe("unknown");
    expect(unknown.message).toBe("Counting stocks failed: boom");

    const existing = new StorageError("connection_lost", "gone");
    expect(toStorageError(existing, "Counting stocks")).toBe(existing);
  });
});
