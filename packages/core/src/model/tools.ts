// =============================================================================
// Tool Specifications
// =============================================================================

/**
 * JSON-schema fragment describing one tool parameter, e.g.
 * `{ type: "string", description: "City name", enum: ["Paris", "Rome"] }`.
 */
export type JsonSchemaProperty = Record<string, unknown>;

/**
 * Parameters of a tool, always a JSON-schema object.
 */
export interface ToolParameters {
  type: "object";
  /** Parameter name to schema fragment */
  properties: Record<string, JsonSchemaProperty>;
  /** Names of the mandatory parameters */
  required: string[];
}

/**
 * A tool the model may ask to execute.
 *
 * @example
 * ```typescript
 * const weather: ToolSpecification = {
 *   name: "get_weather",
 *   description: "Current weather for a city",
 *   parameters: toolParameters({ city: { type: "string" } }, ["city"]),
 * };
 * ```
 */
export interface ToolSpecification {
  name: string;
  description?: string;
  parameters?: ToolParameters;
}

/**
 * A tool invocation requested by the model.
 */
export interface ToolExecutionRequest {
  /** Vendor-assigned call id, echoed back with the result */
  id?: string;
  name: string;
  /** Raw JSON text of the arguments, exactly as the model produced it */
  arguments: string;
}

export function toolParameters(
  properties: Record<string, JsonSchemaProperty> = {},
  required: string[] = []
): ToolParameters {
  return { type: "object", properties, required };
}
