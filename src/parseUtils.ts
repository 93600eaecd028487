// Copyright (c) 2023 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

/**
 * Splits `name(args)` into its function name and argument string.
 * Returns null when the expression has no parenthesis at all (it may be a
 * bare key expression). Throws through `onError` on unbalanced parentheses or
 * characters trailing the closing parenthesis.
 */
export function splitFunctionCall({
  expression,
  onError
}: {
  expression: string;
  onError: (reason: string) => Error;
}): { name: string; args: string } | null {
  const open = expression.indexOf('(');
  if (open === -1) {
    if (expression.includes(')')) throw onError('unbalanced parentheses');
    return null;
  }
  const name = expression.slice(0, open);
  if (!/^[a-z_]+$/.test(name))
    throw onError(`invalid function name "${name}"`);
  let depth = 0;
  for (let i = open; i < expression.length; i++) {
    const char = expression[i];
    if (char === '(') depth++;
    else if (char === ')') {
      depth--;
      if (depth === 0) {
        if (i !== expression.length - 1)
          throw onError(
            `unexpected characters after ${name}(...): ${expression.slice(i + 1)}`
          );
        return { name, args: expression.slice(open + 1, i) };
      }
    }
  }
  throw onError('unbalanced parentheses');
}

/**
 * Splits a function's argument string on the commas that are not nested in
 * parentheses: "2,pk(A),B" -> ["2", "pk(A)", "B"].
 */
export function splitTopLevelArgs({
  expression,
  onError
}: {
  expression: string;
  onError: (reason: string) => Error;
}): string[] {
  const args: string[] = [];
  let parenDepth = 0;
  let start = 0;
  for (let i = 0; i < expression.length; i++) {
    const char = expression[i];
    if (char === '(') {
      parenDepth++;
    } else if (char === ')') {
      if (parenDepth === 0) throw onError('unbalanced parentheses');
      parenDepth--;
    } else if (char === ',' && parenDepth === 0) {
      args.push(expression.slice(start, i));
      start = i + 1;
    }
  }
  if (parenDepth !== 0) throw onError('unbalanced parentheses');
  args.push(expression.slice(start));
  if (args.some(arg => arg === '')) throw onError('empty argument');
  return args;
}
