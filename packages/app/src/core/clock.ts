// CHANGE: make the wall-clock read used by TIME rendering an explicit capability
// WHY: callers that need reproducible output freeze time instead of patching globals
// QUOTE(TZ): n/a
// REF: req-clock-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: fixedClock(d).now() = d
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fixedClock never observes the system time
// COMPLEXITY: O(1)/O(1)

export interface Clock {
  readonly now: () => Date
}

export const systemClock: Clock = {
  now: () => new Date()
}

export const fixedClock = (instant: Date): Clock => {
  const millis = instant.getTime()
  return {
    now: () => new Date(millis)
  }
}
