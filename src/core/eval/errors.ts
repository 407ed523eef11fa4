import { EvaluatorError } from "../console/errors";

export class VoidVariableError extends EvaluatorError {
  constructor(readonly symbol: string) {
    super("void-variable", "E0100", { name: symbol }, `Symbol's value as variable is void: ${symbol}`);
  }
}

export class VoidFunctionError extends EvaluatorError {
  constructor(readonly symbol: string) {
    super("void-function", "E0101", { name: symbol }, `Symbol's function definition is void: ${symbol}`);
  }
}

export class WrongTypeError extends EvaluatorError {
  constructor(expected: string, actual: string) {
    super("wrong-type", "E0102", { expected, actual }, `Wrong type argument: ${expected}, ${actual}`);
  }
}

export class WrongArityError extends EvaluatorError {
  constructor(name: string, actual: number) {
    super("wrong-arity", "E0103", { name, actual }, `Wrong number of arguments: ${name}, ${actual}`);
  }
}

/** Raised by `(error ...)` in user code. */
export class UserError extends EvaluatorError {
  constructor(message: string) {
    super("user-error", "E0104", { message }, message);
  }
}

export class SettingConstantError extends EvaluatorError {
  constructor(readonly symbol: string) {
    super("setting-constant", "E0105", { name: symbol }, `Attempt to set a constant symbol: ${symbol}`);
  }
}
