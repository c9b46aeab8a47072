// Result values for rule operations that can be refused (never thrown)

export interface Success {
  ok: true;
  message: string;
}

export interface Failure<R extends string> {
  ok: false;
  reason: R;
  message: string;
}

export type Outcome<R extends string> = Success | Failure<R>;

export function succeed(message: string): Success {
  return { ok: true, message };
}

export function fail<R extends string>(reason: R, message: string): Failure<R> {
  return { ok: false, reason, message };
}
