export class StorageCorruptError extends Error {
  constructor(
    readonly location: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Storage document at ${location} is unreadable: ${detail}`, { cause });
    this.name = "StorageCorruptError";
  }
}

export class CodeSpaceExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super(`Could not issue a unique code after ${attempts} attempts`);
    this.name = "CodeSpaceExhaustedError";
  }
}
