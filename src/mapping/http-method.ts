export const STANDARD_HTTP_METHODS = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
] as const

export type StandardHttpMethod = (typeof STANDARD_HTTP_METHODS)[number]

/**
 * A request or rule method. Unknown tokens are kept verbatim and
 * extension methods still compare exactly.
 */
export type HttpMethod =
  | { kind: 'standard'; name: StandardHttpMethod }
  | { kind: 'other'; name: string }

/**
 * Case-sensitive: `get` is an `other` method, distinct from `GET`
 */
export function parseHttpMethod(raw: string): HttpMethod {
  const standard = STANDARD_HTTP_METHODS.find((method) => method === raw)
  return standard
    ? { kind: 'standard', name: standard }
    : { kind: 'other', name: raw }
}

export function sameMethod(a: HttpMethod, b: HttpMethod): boolean {
  return a.kind === b.kind && a.name === b.name
}
