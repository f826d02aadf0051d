// String literals are matched first so digits inside them stay untouched
const JSON_TOKEN_PATTERN = /"(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/g;

/**
 * Decode JSON keeping every numeric literal as its exact source text.
 * `{"amount": 0.1}` becomes `{ amount: '0.1' }`, never the float 0.1.
 *
 * @throws SyntaxError when the text is not JSON
 */
export function decodeExactJson(text: string): unknown {
  const quoted = text.replace(JSON_TOKEN_PATTERN, (token) => (token.startsWith('"') ? token : `"${token}"`));
  return JSON.parse(quoted);
}
