import type { ParameterType, ToolDefinition, ToolDescriptor, ToolParameter } from "../types.ts";

export class ToolSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolSchemaError";
  }
}

type ParameterSpec = {
  type: string;
  description: string;
  required?: boolean;
};

function isParameterType(type: string): type is ParameterType {
  return type === "string" || type === "boolean";
}

/** Declares a tool. Only string and boolean params are supported; any other type throws. */
export function defineTool<Name extends string>(spec: {
  name: Name;
  description: string;
  parameters: Record<string, ParameterSpec>;
}): ToolDescriptor<Name> {
  const parameters: Record<string, Readonly<ToolParameter>> = {};
  for (const [param, { type, description, required }] of Object.entries(spec.parameters)) {
    if (!isParameterType(type)) {
      throw new ToolSchemaError(`Unsupported tool parameter type '${type}' for ${spec.name}.${param}`);
    }
    parameters[param] = Object.freeze({ type, description, required: required === true });
  }
  return Object.freeze({
    name: spec.name,
    description: spec.description,
    parameters: Object.freeze(parameters),
  });
}

/** The OpenAI function-calling shape advertised to the model. */
export function toToolDefinition(descriptor: ToolDescriptor): ToolDefinition {
  const properties: Record<string, { type: ParameterType; description: string }> = {};
  const required: string[] = [];
  for (const [param, { type, description, required: isRequired }] of Object.entries(descriptor.parameters)) {
    properties[param] = { type, description };
    if (isRequired) required.push(param);
  }
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: { type: "object", properties, required },
  };
}
