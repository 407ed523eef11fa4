import type { Datum, Sym } from "../reader/datum";
import { isSym, isVec } from "../reader/datum";
import type { Val, ClosureVal } from "./values";
import { VNil, datumToVal, symVal, isTruthy, isCallable, list, listItems, vector } from "./values";
import { Env } from "./env";
import { buildPrims } from "./prims";
import { VoidVariableError, VoidFunctionError, WrongTypeError, WrongArityError, SettingConstantError } from "./errors";
import type { Evaluator } from "../console/types";
import { printDatum, printVal } from "../printer/print";

/**
 * Execution context of the scratch evaluator: one buffer's global variables
 * and function definitions. Variables and functions live in separate
 * namespaces, as in Emacs Lisp.
 */
export class ScratchContext {
  readonly globals = new Env();
  readonly functions = new Map<string, Val>();

  constructor(readonly name = "*scratch*") {
    for (const [fname, prim] of buildPrims()) {
      this.functions.set(fname, prim);
    }
  }
}

export function createScratchContext(name?: string): ScratchContext {
  return new ScratchContext(name);
}

type SpecialForm = (args: Datum[], env: Env, ctx: ScratchContext) => Val;

function symbolName(d: Datum): string {
  if (!isSym(d)) throw new WrongTypeError("symbolp", printDatum(d));
  if (d.sym === "nil" || d.sym === "t" || d.sym.startsWith(":")) throw new SettingConstantError(d.sym);
  return d.sym;
}

function isLambdaForm(d: Datum): boolean {
  if (!Array.isArray(d) || d.length === 0) return false;
  const first = d[0];
  return isSym(first) && first.sym === "lambda";
}

/** The operand of `(head x)`, when `d` is exactly that form. */
function prefixed(d: Datum, head: string): Datum | undefined {
  if (!Array.isArray(d) || d.length !== 2) return undefined;
  const first = d[0];
  return isSym(first) && first.sym === head ? d[1] : undefined;
}

function asList(d: Datum): Datum[] {
  if (Array.isArray(d)) return d;
  if (isSym(d) && d.sym === "nil") return [];
  throw new WrongTypeError("listp", printDatum(d));
}

/** Parse a lambda list such as `(a b &optional c &rest d)`. */
function parseLambdaList(d: Datum): Pick<ClosureVal, "params" | "optional" | "rest"> {
  const params: string[] = [];
  const optional: string[] = [];
  let rest: string | undefined;
  let mode: "req" | "opt" | "rest" = "req";
  for (const item of asList(d)) {
    const name = symbolName(item);
    if (name === "&optional") { mode = "opt"; continue; }
    if (name === "&rest") { mode = "rest"; continue; }
    if (mode === "req") params.push(name);
    else if (mode === "opt") optional.push(name);
    else rest = name;
  }
  return { params, optional, rest };
}

/**
 * Small Emacs-Lisp-flavoured evaluator used as the default host for the
 * console. Evaluation is direct recursion over reader data.
 */
export class ScratchEvaluator implements Evaluator<ScratchContext> {
  private readonly special: Record<string, SpecialForm> = {
    quote: (args) => datumToVal(args[0] ?? []),

    function: (args, env, ctx) => {
      const target = args[0] ?? [];
      if (isSym(target)) {
        const fn = ctx.functions.get(target.sym);
        if (!fn) throw new VoidFunctionError(target.sym);
        return fn;
      }
      return this.evalIn(target, env, ctx);
    },

    if: (args, env, ctx) => {
      if (args.length < 2) throw new WrongArityError("if", args.length);
      if (isTruthy(this.evalIn(args[0], env, ctx))) {
        return this.evalIn(args[1], env, ctx);
      }
      return this.progn(args.slice(2), env, ctx);
    },

    cond: (args, env, ctx) => {
      for (const clause of args) {
        const [test, ...body] = asList(clause);
        if (test === undefined) continue;
        const v = this.evalIn(test, env, ctx);
        if (isTruthy(v)) return body.length === 0 ? v : this.progn(body, env, ctx);
      }
      return VNil;
    },

    when: (args, env, ctx) =>
      isTruthy(this.evalIn(args[0] ?? [], env, ctx)) ? this.progn(args.slice(1), env, ctx) : VNil,

    unless: (args, env, ctx) =>
      isTruthy(this.evalIn(args[0] ?? [], env, ctx)) ? VNil : this.progn(args.slice(1), env, ctx),

    and: (args, env, ctx) => {
      let v: Val = symVal("t");
      for (const a of args) {
        v = this.evalIn(a, env, ctx);
        if (!isTruthy(v)) return VNil;
      }
      return v;
    },

    or: (args, env, ctx) => {
      for (const a of args) {
        const v = this.evalIn(a, env, ctx);
        if (isTruthy(v)) return v;
      }
      return VNil;
    },

    progn: (args, env, ctx) => this.progn(args, env, ctx),

    "`": (args, env, ctx) => {
      if (args.length !== 1) throw new WrongArityError("`", args.length);
      return this.backquote(args[0], 1, env, ctx);
    },

    setq: (args, env, ctx) => {
      if (args.length % 2 !== 0) throw new WrongArityError("setq", args.length);
      let v: Val = VNil;
      for (let i = 0; i < args.length; i += 2) {
        const name = symbolName(args[i]);
        v = this.evalIn(args[i + 1], env, ctx);
        env.assign(name, v);
      }
      return v;
    },

    defvar: (args, env, ctx) => {
      if (args.length === 0) throw new WrongArityError("defvar", 0);
      const name = symbolName(args[0]);
      if (args.length > 1 && !ctx.globals.isBound(name)) {
        ctx.globals.define(name, this.evalIn(args[1], env, ctx));
      }
      return symVal(name);
    },

    defun: (args, env, ctx) => {
      if (args.length < 2) throw new WrongArityError("defun", args.length);
      const name = symbolName(args[0]);
      ctx.functions.set(name, this.makeClosure(args[1], args.slice(2), env, name));
      return symVal(name);
    },

    lambda: (args, env) => {
      if (args.length === 0) throw new WrongArityError("lambda", 0);
      return this.makeClosure(args[0], args.slice(1), env);
    },

    let: (args, env, ctx) => {
      if (args.length === 0) throw new WrongArityError("let", 0);
      const binds = asList(args[0]).map((b): [string, Val] => {
        if (isSym(b)) return [symbolName(b), VNil];
        const [name, init] = asList(b);
        return [symbolName(name ?? []), init === undefined ? VNil : this.evalIn(init, env, ctx)];
      });
      return this.progn(args.slice(1), env.extend(binds), ctx);
    },

    "let*": (args, env, ctx) => {
      if (args.length === 0) throw new WrongArityError("let*", 0);
      let scope = env;
      for (const b of asList(args[0])) {
        if (isSym(b)) {
          scope = scope.extend([[symbolName(b), VNil]]);
          continue;
        }
        const [name, init] = asList(b);
        const v = init === undefined ? VNil : this.evalIn(init, scope, ctx);
        scope = scope.extend([[symbolName(name ?? []), v]]);
      }
      return this.progn(args.slice(1), scope, ctx);
    },

    while: (args, env, ctx) => {
      if (args.length === 0) throw new WrongArityError("while", 0);
      while (isTruthy(this.evalIn(args[0], env, ctx))) {
        this.progn(args.slice(1), env, ctx);
      }
      return VNil;
    },
  };

  exec(form: Datum, context: ScratchContext): Val {
    return this.evalIn(form, context.globals, context);
  }

  private evalIn(d: Datum, env: Env, ctx: ScratchContext): Val {
    if (isSym(d)) return this.lookupVariable(d, env);
    // Numbers, strings and vectors evaluate to themselves.
    if (!Array.isArray(d)) return datumToVal(d);
    if (d.length === 0) return VNil;

    const [head, ...args] = d;
    if (isSym(head)) {
      const special = Object.hasOwn(this.special, head.sym) ? this.special[head.sym] : undefined;
      if (special) return special(args, env, ctx);
      const fn = ctx.functions.get(head.sym);
      if (!fn) throw new VoidFunctionError(head.sym);
      return this.apply(fn, args.map((a) => this.evalIn(a, env, ctx)), ctx);
    }

    // ((lambda (x) ...) args)
    if (isLambdaForm(head)) {
      const fn = this.evalIn(head, env, ctx);
      return this.apply(fn, args.map((a) => this.evalIn(a, env, ctx)), ctx);
    }
    throw new VoidFunctionError(printDatum(head));
  }

  private lookupVariable(s: Sym, env: Env): Val {
    if (s.sym === "nil" || s.sym === "t" || s.sym.startsWith(":")) return symVal(s.sym);
    const v = env.lookup(s.sym);
    if (v === undefined) throw new VoidVariableError(s.sym);
    return v;
  }

  /**
   * Expand a backquoted template. `,x` is evaluated and `,@x` spliced at
   * nesting depth 1; a nested backquote raises the depth and commas lower it.
   */
  private backquote(d: Datum, depth: number, env: Env, ctx: ScratchContext): Val {
    if (isVec(d)) return vector(this.backquoteItems(d.vec, depth, env, ctx));
    if (!Array.isArray(d)) return datumToVal(d);

    const unquoted = prefixed(d, ",");
    if (unquoted !== undefined) {
      return depth === 1
        ? this.evalIn(unquoted, env, ctx)
        : list([symVal(","), this.backquote(unquoted, depth - 1, env, ctx)]);
    }
    const nested = prefixed(d, "`");
    if (nested !== undefined) {
      return list([symVal("`"), this.backquote(nested, depth + 1, env, ctx)]);
    }
    return list(this.backquoteItems(d, depth, env, ctx));
  }

  private backquoteItems(items: Datum[], depth: number, env: Env, ctx: ScratchContext): Val[] {
    return items.flatMap((item) => {
      const spliced = prefixed(item, ",@");
      if (spliced === undefined) return [this.backquote(item, depth, env, ctx)];
      if (depth > 1) return [list([symVal(",@"), this.backquote(spliced, depth - 1, env, ctx)])];
      const v = this.evalIn(spliced, env, ctx);
      const elems = listItems(v);
      if (!elems) throw new WrongTypeError("listp", printVal(v));
      return elems;
    });
  }

  private progn(body: Datum[], env: Env, ctx: ScratchContext): Val {
    let v: Val = VNil;
    for (const form of body) v = this.evalIn(form, env, ctx);
    return v;
  }

  private makeClosure(lambdaList: Datum, body: Datum[], env: Env, name?: string): ClosureVal {
    return { tag: "Closure", name, ...parseLambdaList(lambdaList), body, env };
  }

  private apply(fn: Val, args: Val[], ctx: ScratchContext): Val {
    if (!isCallable(fn)) throw new WrongTypeError("functionp", printVal(fn));

    if (fn.tag === "Native") {
      if (fn.arity !== "variadic" && fn.arity !== args.length) {
        throw new WrongArityError(fn.name, args.length);
      }
      return fn.fn(args, (proc, procArgs) => this.apply(proc, procArgs, ctx));
    }

    const { params, optional, rest } = fn;
    const max = params.length + optional.length;
    if (args.length < params.length || (!rest && args.length > max)) {
      throw new WrongArityError(fn.name ?? "lambda", args.length);
    }
    const binds: Array<[string, Val]> = params.map((p, i) => [p, args[i]]);
    optional.forEach((p, i) => binds.push([p, args[params.length + i] ?? VNil]));
    if (rest) {
      const extra = args.slice(max);
      binds.push([rest, extra.length === 0 ? VNil : { tag: "List", items: extra }]);
    }
    return this.progn(fn.body, fn.env.extend(binds), ctx);
  }
}
