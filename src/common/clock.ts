export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }
}

export class FixedClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime())
  }

  set(next: Date): void {
    this.current = next
  }
}
