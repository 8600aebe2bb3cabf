/**
 * Result type shared by every analysis stage.
 *
 * A failed result carries at least one message of severity `Error`.
 */

export enum Severity {
  Error = "error",
  Warning = "warning",
}

export interface Message {
  readonly severity: Severity;
  readonly message: string;
}

export type MessagesBySeverity<E> = {
  [S in Severity]?: E[];
};

export type Success<T, E> = {
  success: true;
  value: T;
  messages: MessagesBySeverity<E>;
};

export type Failure<E> = {
  success: false;
  messages: MessagesBySeverity<E>;
};

export type Result<T, E> = Success<T, E> | Failure<E>;

export const Result = {
  ok<T, E = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  },

  err<T = never, E extends Message = Message>(error: E | E[]): Result<T, E> {
    const errors = Array.isArray(error) ? error : [error];
    const messages: MessagesBySeverity<E> = {};
    for (const e of errors) {
      const bucket = messages[e.severity] ?? [];
      bucket.push(e);
      messages[e.severity] = bucket;
    }
    return { success: false, messages };
  },

  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return {
      success: true,
      value: fn(result.value),
      messages: result.messages,
    };
  },

  /**
   * Every message of severity `Error`
   */
  errors<T, E>(result: Result<T, E>): E[] {
    return result.messages[Severity.Error] ?? [];
  },

  firstError<T, E>(result: Result<T, E>): E | undefined {
    return result.messages[Severity.Error]?.[0];
  },

  hasErrors<T, E>(result: Result<T, E>): boolean {
    return (result.messages[Severity.Error]?.length ?? 0) > 0;
  },
};
