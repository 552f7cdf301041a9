import { withSpan, type WithSpanOptions } from "./with-span.js";

/** The call a {@link traced} options factory is asked about. */
export interface TracedCallContext {
  /** Name of the receiver's class, or of the class itself for static methods. */
  className: string;
  methodName: string;
  args: unknown[];
}

export type TracedInput =
  | WithSpanOptions
  | ((call: TracedCallContext) => WithSpanOptions);

function receiverName(self: unknown): string {
  if (typeof self === "function") return self.name || "anonymous";
  if (typeof self === "object" && self !== null) {
    return self.constructor?.name || "anonymous";
  }
  return "anonymous";
}

function spanOptionsFor(input: TracedInput | undefined, call: TracedCallContext): WithSpanOptions {
  const base = typeof input === "function" ? input(call) : input ?? {};
  return {
    ...base,
    name: base.name ?? `${call.className}.${call.methodName}`,
    target: base.target ?? call.className,
  };
}

/**
 * Method decorator (TC39 decorators) that runs each call inside a
 * {@link withSpan} span named `ClassName.method`, with the class name as target.
 *
 * Pass options, or a factory that builds them from the call's arguments.
 *
 * @example
 * ```ts
 * class InventoryService {
 *   @traced({ level: "debug" })
 *   reserve(sku: string, quantity: number) { ... } // "InventoryService.reserve"
 *
 *   @traced(({ args }) => ({ attributes: { sku: String(args[0]) } }))
 *   async release(sku: string) { ... }
 * }
 * ```
 */
export function traced(input?: TracedInput) {
  return function <This, Args extends unknown[], Return>(
    method: (this: This, ...args: Args) => Return,
    context: ClassMethodDecoratorContext<This, (this: This, ...args: Args) => Return>,
  ): (this: This, ...args: Args) => Return {
    const methodName = String(context.name);

    return function (this: This, ...args: Args): Return {
      const options = spanOptionsFor(input, { className: receiverName(this), methodName, args });
      // withSpan returns a promise exactly when the method does.
      return withSpan(() => method.call(this, ...args), options) as Return;
    };
  };
}
