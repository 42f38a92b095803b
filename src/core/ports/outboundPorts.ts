export interface ClockPort {
  now(): Date;
}

/**
 * Destination for rendered text; `target` names it in write failures.
 */
export interface OutputSinkPort {
  readonly target: string;
  write(text: string): void;
}
