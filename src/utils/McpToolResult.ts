import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isMcpToolResult(value: unknown): value is CallToolResult {
  if (!isRecord(value) || !Array.isArray(value.content)) return false;
  return value.content.every(
    (block: unknown) =>
      isRecord(block) &&
      typeof block.type === 'string' &&
      (block.type !== 'text' || typeof block.text === 'string'),
  );
}

/**
 * Wrap a tool's return value as a single text block (JSON for objects).
 * Payloads carrying an `error` key are flagged with `isError`.
 */
export function toMcpToolResult(value: unknown): CallToolResult {
  if (isMcpToolResult(value)) return value;
  const text =
    typeof value === 'string'
      ? value
      : value === undefined
        ? 'undefined'
        : JSON.stringify(value, null, 2);
  const result: CallToolResult = {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
  if (isRecord(value) && typeof value.error === 'string') {
    result.isError = true;
  }
  return result;
}
