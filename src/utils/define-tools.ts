import { z } from "zod";
import type { ZodRawShape } from "zod";
import { InvalidArgument, TelescopeError, errorMessage } from "./errors";

export type ToolResponse = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

export type ToolArgs<Shape extends ZodRawShape> = z.output<z.ZodObject<Shape, "strip">>;

export type ToolSpec<Shape extends ZodRawShape> = {
    name: string;
    description: string;
    inputSchema: Shape;
    /** Prefix of the text shown when the call fails, e.g. "Failed to fetch requests". */
    failure: string;
    run: (args: ToolArgs<Shape>) => Promise<string>;
};

/** What the server registers: schema for the agent, handler for the call. */
export type Tool = {
    name: string;
    description: string;
    inputSchema: ZodRawShape;
    handler: (input: Record<string, unknown>) => Promise<ToolResponse>;
};

export const textResult = (text: string): ToolResponse => ({
    content: [{ type: "text", text }]
});

/** `label [CODE]: message`; errors outside the taxonomy carry no code. */
export function failureResult(label: string, error: unknown): ToolResponse {
    const kind = error instanceof TelescopeError ? ` [${error.code}]` : "";
    const text = `${label}${kind}: ${errorMessage(error)}`;
    console.error(`[tool] ${text}`);
    return {
        content: [{ type: "text", text: `❌ ${text}` }],
        isError: true
    };
}

const describeIssues = (error: z.ZodError): string =>
    error.issues
        .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ");

/**
 * Wraps a tool body: arguments are re-validated against the declared shape,
 * and any failure becomes an `isError` text result instead of escaping the
 * dispatcher.
 */
export function defineTool<Shape extends ZodRawShape>(definition: ToolSpec<Shape>): Tool {
    const schema = z.object(definition.inputSchema);
    return {
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema,
        handler: async (input) => {
            const parsed = schema.safeParse(input);
            if (!parsed.success) {
                return failureResult(
                    definition.failure,
                    new InvalidArgument(`Invalid input: ${describeIssues(parsed.error)}`)
                );
            }
            try {
                return textResult(await definition.run(parsed.data));
            } catch (error) {
                return failureResult(definition.failure, error);
            }
        }
    };
}
