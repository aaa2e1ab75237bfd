/**
 * Shared shapes for tool responses
 */

// A type alias, not an interface: the SDK's result type carries an index signature
export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function jsonResponse(value: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Failure response naming the error type, e.g.
 * "Error executing SQL: ReadOnlyViolationError: ..."
 */
export function errorResponse(action: string, error: unknown): ToolResponse {
  const errorMessage =
    error instanceof Error ? `${error.name}: ${error.message}` : 'Unknown error occurred';

  return {
    content: [
      {
        type: 'text',
        text: `Error ${action}: ${errorMessage}`,
      },
    ],
    isError: true,
  };
}
