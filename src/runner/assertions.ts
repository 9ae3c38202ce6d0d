export class AssertionFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssertionFailure';
  }
}

export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new AssertionFailure(message);
  }
}

export function assertStatusIn(status: number, accepted: readonly number[], subject: string): void {
  assert(
    accepted.includes(status),
    `${subject} returned status code ${status} (expected one of ${accepted.join(', ')})`,
  );
}
