import { DomainError } from "../errors.js";

/** Result counts must be whole numbers; n <= 0 simply selects nothing. */
export function assertCount(n: number, what: string): void {
  if (!Number.isInteger(n)) throw new DomainError(`${what} must be an integer, got ${n}`);
}
