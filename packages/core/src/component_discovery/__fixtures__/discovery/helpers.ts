export class Debouncer {
  constructor(readonly delayMs: number) {}
}

export const DEFAULT_DELAY_MS = 250;
