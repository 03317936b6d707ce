export interface ToolResult {
    [key: string]: unknown;
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

export function textResult(text: string): ToolResult {
    return {
        content: [
            {
                type: 'text',
                text,
            },
        ],
    };
}

export function jsonResult(value: unknown): ToolResult {
    return textResult(JSON.stringify(value, null, 2));
}

/**
 * Error message for the client; the server keeps running
 */
export function errorResult(action: string, error: unknown): ToolResult {
    return {
        content: [
            {
                type: 'text',
                text: `Error ${action}: ${error instanceof Error ? error.message : 'Unknown error'}`,
            },
        ],
        isError: true,
    };
}
