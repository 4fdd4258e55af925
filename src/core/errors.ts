import type { ZodError } from "zod";

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownActorTypeError extends DecodeError {
  readonly keys: string[];

  constructor(keys: string[]) {
    super(`unknown actor type (keys: ${keys.length ? keys.join(", ") : "none"})`);
    this.keys = keys;
  }
}

export class MalformedPayloadError extends DecodeError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`malformed payload at ${path || "<root>"}: ${detail}`);
    this.path = path;
  }

  static fromZod(what: string, err: ZodError): MalformedPayloadError {
    const issue = err.issues[0];
    const path = [what, ...(issue?.path ?? [])].join(".");
    return new MalformedPayloadError(path, issue?.message ?? "invalid");
  }
}

export class DateTimeParseError extends DecodeError {
  readonly input: string;

  constructor(input: string) {
    super(`invalid ISO-8601 timestamp: ${JSON.stringify(input)}`);
    this.input = input;
  }
}

export function assertNever(x: never): never {
  throw new Error(`unexpected variant: ${JSON.stringify(x)}`);
}
