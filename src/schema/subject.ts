/**
 * Subject grammar.
 *
 * A subject is a dot-delimited list of tokens, e.g. `events.user.login`.
 * As a whole token, `*` matches exactly one token and `>` matches one or
 * more trailing tokens (only valid in last position).
 */

export const SINGLE_WILDCARD = '*';
export const TAIL_WILDCARD = '>';

const WHITESPACE = /\s/;

export function tokenize(subject: string): string[] {
  return subject.split('.');
}

/**
 * Returns why `subject` is malformed, or `undefined` when it is well formed.
 * Wildcards are accepted here; publish-side callers reject them separately.
 */
export function subjectProblem(subject: string): string | undefined {
  if (subject.length === 0) return 'subject must not be empty';
  if (WHITESPACE.test(subject)) return 'subject must not contain whitespace';

  const tokens = tokenize(subject);
  if (tokens.some((t) => t.length === 0)) {
    return `subject ${JSON.stringify(subject)} contains an empty token`;
  }

  const tail = tokens.indexOf(TAIL_WILDCARD);
  if (tail !== -1 && tail !== tokens.length - 1) {
    return `"${TAIL_WILDCARD}" must be the last token of ${JSON.stringify(subject)}`;
  }

  return undefined;
}

export function isValidSubject(subject: string): boolean {
  return subjectProblem(subject) === undefined;
}

export function hasWildcard(subject: string): boolean {
  return tokenize(subject).some(
    (t) => t === SINGLE_WILDCARD || t === TAIL_WILDCARD,
  );
}

/** Whether a concrete `subject` is routed to a subscription on `pattern`. */
export function matchSubject(pattern: string, subject: string): boolean {
  const want = tokenize(pattern);
  const have = tokenize(subject);

  for (let i = 0; i < want.length; i++) {
    const token = want[i];
    if (token === TAIL_WILDCARD) return have.length > i;
    if (i >= have.length) return false;
    if (token !== SINGLE_WILDCARD && token !== have[i]) return false;
  }

  return want.length === have.length;
}
