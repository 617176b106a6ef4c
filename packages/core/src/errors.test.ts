import {
  DuplicateEntryError,
  InvalidArgumentError,
  InvalidCredentialsError,
  LockedError,
  NotFoundError,
  UninitializedError,
  VaultError,
  isVaultError,
  normalizeError
} from "./errors";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

(() => {
  const errors: VaultError[] = [
    new InvalidArgumentError("bad"),
    new DuplicateEntryError("dup"),
    new NotFoundError("missing"),
    new InvalidCredentialsError(),
    new UninitializedError(),
    new LockedError(3)
  ];
  assertEqual(
    errors.map((error) => error.code).join(","),
    "invalid_argument,duplicate_entry,not_found,invalid_credentials,uninitialized,locked",
    "every condition should have its own code"
  );
  assertEqual(
    errors.map((error) => error.name).join(","),
    "InvalidArgumentError,DuplicateEntryError,NotFoundError,InvalidCredentialsError,UninitializedError,LockedError",
    "names should follow the class"
  );
})();

(() => {
  assertEqual(new InvalidCredentialsError().message, "Invalid credentials. Set main password correctly.", "default message");
  assertEqual(new LockedError(3).message, "Master password rejected after 3 attempts.", "locked message");
  assertEqual(new LockedError(3).attempts, 3, "attempt count should be kept");

  const cause = new Error("sqlite");
  assertEqual(new DuplicateEntryError("dup", { cause }).cause, cause, "cause should be kept");
})();

(() => {
  assertEqual(isVaultError(new NotFoundError("x")), true, "vault errors should be recognized");
  assertEqual(isVaultError(new Error("x")), false, "plain errors should not be vault errors");
  assertEqual(normalizeError(new Error("boom")), "boom", "error message should be used");
  assertEqual(normalizeError("boom"), "Unknown vault error", "non-errors should get a fallback");
})();
