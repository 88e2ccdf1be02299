// =============================================================================
// Result<T> — Shared Success/Failure Type
// =============================================================================

type State<T> = { ok: true; value: T } | { ok: false; error: string };

export class Result<T> {
  private constructor(private readonly state: State<T>) {}

  static ok<T>(value: T): Result<T> {
    return new Result<T>({ ok: true, value });
  }

  static err<T = never>(error: string): Result<T> {
    return new Result<T>({ ok: false, error });
  }

  get ok(): boolean {
    return this.state.ok;
  }

  get value(): T | undefined {
    return this.state.ok ? this.state.value : undefined;
  }

  get error(): string | undefined {
    return this.state.ok ? undefined : this.state.error;
  }

  map<U>(fn: (value: T) => U): Result<U> {
    return this.state.ok ? Result.ok(fn(this.state.value)) : Result.err(this.state.error);
  }

  flatMap<U>(fn: (value: T) => Result<U>): Result<U> {
    return this.state.ok ? fn(this.state.value) : Result.err(this.state.error);
  }

  match<U>(cases: { ok: (value: T) => U; err: (error: string) => U }): U {
    return this.state.ok ? cases.ok(this.state.value) : cases.err(this.state.error);
  }
}
