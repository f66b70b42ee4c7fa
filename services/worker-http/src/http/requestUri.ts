import { MalformedRequestError } from '../errors';

export type RequestDescriptor = Readonly<{
  mappingPath: string;
  remainingSegments: readonly string[];
  parameters: Readonly<Record<string, string>>;
}>;

function parseQueryString(query: string): Record<string, string> {
  const parameters: Record<string, string> = Object.create(null);
  if (!query) {
    return parameters;
  }
  for (const pair of query.split('&')) {
    if (!pair) {
      continue;
    }
    const separator = pair.indexOf('=');
    const key = separator === -1 ? pair : pair.slice(0, separator);
    if (!key) {
      continue;
    }
    parameters[key] = separator === -1 ? '' : pair.slice(separator + 1);
  }
  return parameters;
}

/**
 * Splits a request target such as `/file/abc/page/0?offset=10` into its
 * mapping path, the remaining path segments and the query parameters.
 *
 * Values are kept exactly as they arrived; callers that need reserved
 * characters decoded run {@link handleReservedCharacters} themselves.
 */
export function parseRequestUri(rawUri: string): RequestDescriptor {
  if (!rawUri.startsWith('/')) {
    throw new MalformedRequestError('Request URI must start with a path', { uri: rawUri });
  }

  const fragmentIndex = rawUri.indexOf('#');
  const target = fragmentIndex === -1 ? rawUri : rawUri.slice(0, fragmentIndex);
  const queryIndex = target.indexOf('?');
  const pathPart = queryIndex === -1 ? target : target.slice(0, queryIndex);
  const queryPart = queryIndex === -1 ? '' : target.slice(queryIndex + 1);

  const segments = pathPart.split('/').filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new MalformedRequestError('Request URI has no mapping path', { uri: rawUri });
  }

  const [mappingPath, ...remainingSegments] = segments;
  return Object.freeze({
    mappingPath,
    remainingSegments: Object.freeze(remainingSegments),
    parameters: Object.freeze(parseQueryString(queryPart))
  });
}

// The transport leaves these escapes in query values.
const RESERVED_ESCAPES: ReadonlyArray<[RegExp, string]> = [
  [/%2F/g, '/'],
  [/%3A/g, ':'],
  [/%3F/g, '?']
];

export function handleReservedCharacters(value: string): string {
  let result = value;
  for (const [pattern, replacement] of RESERVED_ESCAPES) {
    result = result.replace(pattern, replacement);
  }
  return result;
}
