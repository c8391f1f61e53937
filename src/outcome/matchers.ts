import type { Outcome } from "./outcome";
import { isDone } from "./outcome";

export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new Error(o.failure.message);
}
