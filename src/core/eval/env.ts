import type { Val } from "./values";

/**
 * Lexical variable environment: a chain of frames ending at the context's
 * global frame.
 */
export class Env {
  private readonly vars = new Map<string, Val>();

  constructor(readonly parent?: Env) {}

  lookup(name: string): Val | undefined {
    for (let env: Env | undefined = this; env; env = env.parent) {
      const v = env.vars.get(name);
      if (v !== undefined) return v;
    }
    return undefined;
  }

  isBound(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  define(name: string, v: Val): void {
    this.vars.set(name, v);
  }

  /** `setq` semantics: update the nearest binding, else bind globally. */
  assign(name: string, v: Val): void {
    let env: Env = this;
    for (let e: Env | undefined = this; e; e = e.parent) {
      if (e.vars.has(name)) {
        e.vars.set(name, v);
        return;
      }
      env = e;
    }
    env.vars.set(name, v);
  }

  extend(binds: Array<[string, Val]>): Env {
    const child = new Env(this);
    for (const [name, v] of binds) child.define(name, v);
    return child;
  }
}
