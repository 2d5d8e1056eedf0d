import { z } from "zod";
import prettier from "@prettier/sync";

/**
 * Convert Zod Schema to TypeScript Interface definition string with JSDoc comments.
 * Used for System Prompts.
 */
export function zodToTs(schema: z.ZodTypeAny, name: string): string {
  return prettier.format(`interface ${name} ${printNode(schema)}`, {
    parser: "typescript",
  });
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  let inner = schema;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
    const next: z.ZodTypeAny = inner.unwrap();
    inner = next;
  }
  return inner;
}

/**
 * First description found on the field or on any optional/nullable wrapper.
 */
function descriptionOf(schema: z.ZodTypeAny): string | undefined {
  let current = schema;
  while (!current.description) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      const next: z.ZodTypeAny = current.unwrap();
      current = next;
    } else {
      return undefined;
    }
  }
  return current.description;
}

function printNode(schema: z.ZodTypeAny, indent = 0): string {
  const pad = "  ".repeat(indent);
  const inner = unwrap(schema);

  if (inner instanceof z.ZodString || inner instanceof z.ZodDate) {
    return "string";
  }
  if (inner instanceof z.ZodNumber) {
    return "number";
  }
  if (inner instanceof z.ZodBoolean) {
    return "boolean";
  }

  if (inner instanceof z.ZodArray) {
    const element: z.ZodTypeAny = inner.element;
    return `${printNode(element, indent)}[]`;
  }

  if (inner instanceof z.ZodObject) {
    const shape: z.ZodRawShape = inner.shape;
    const lines = Object.entries(shape).map(([key, field]) => {
      const description = descriptionOf(field);
      const fieldDesc = description ? `  /** ${description} */\n` : "";
      const optional = field.isOptional() ? "?" : "";
      const typeStr = printNode(field, indent + 1);

      return `${pad}${fieldDesc}${pad}  ${key}${optional}: ${typeStr};`;
    });
    return `{\n${lines.join("\n")}\n${pad}}`;
  }

  if (inner instanceof z.ZodEnum) {
    const options: readonly string[] = inner.options;
    return options.map((o) => JSON.stringify(o)).join(" | ");
  }

  if (inner instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = inner.options;
    return options.map((o) => printNode(o, indent)).join(" | ");
  }

  if (inner instanceof z.ZodLiteral) {
    const value: unknown = inner.value;
    return JSON.stringify(value) ?? "unknown";
  }

  return "unknown";
}
