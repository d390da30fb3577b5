import { Ajv } from "ajv";
import type { ErrorObject } from "ajv";

import schema from "../../schema/source-unit.schema.json" with { type: "json" };
import type { SourceUnit } from "../model/ast.js";
import { VmError, type VmErrorCode } from "../errors.js";

const decoder = new TextDecoder();

const ajv = new Ajv({ allErrors: true, strict: false, discriminator: true });
const validateSourceUnit = ajv.compile<SourceUnit>(schema);

function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

function appendPointer(path: string, segment?: string): string {
  if (segment === undefined) {
    return path || "/";
  }
  return `${path || ""}/${encodePointerSegment(segment)}`;
}

function normalizePointer(path: string | undefined): string {
  return path && path.length > 0 ? path : "/";
}

function stringParam(error: ErrorObject, key: string): string | undefined {
  const params: Record<string, unknown> = error.params;
  const value = params[key];
  return typeof value === "string" ? value : undefined;
}

function mapError(error: ErrorObject): VmError {
  const basePath = error.instancePath ?? "";
  const fail = (code: VmErrorCode, pointer: string) =>
    new VmError(code, normalizePointer(pointer), { details: { pointer: normalizePointer(pointer), keyword: error.keyword } });

  switch (error.keyword) {
    case "required":
      return fail("E_AST_FIELD_MISSING", appendPointer(basePath, stringParam(error, "missingProperty")));
    case "additionalProperties":
      return fail("E_AST_FIELD_UNKNOWN", appendPointer(basePath, stringParam(error, "additionalProperty")));
    case "discriminator":
      if (stringParam(error, "error") === "tag") {
        return fail("E_AST_FIELD_MISSING", appendPointer(basePath, "kind"));
      }
      return fail("E_AST_KIND", appendPointer(basePath, "kind"));
    case "type":
      return fail("E_AST_TYPE", basePath);
    case "const":
    case "enum":
      return fail(/\/kind$/.test(basePath) ? "E_AST_KIND" : "E_AST_VALUE", basePath);
    default:
      return fail("E_AST_VALUE", basePath);
  }
}

function errorDepth(error: ErrorObject): number {
  const base = error.instancePath ? error.instancePath.split("/").filter(Boolean).length : 0;
  if (error.keyword === "additionalProperties" || error.keyword === "required" || error.keyword === "discriminator") {
    return base + 1;
  }
  return base;
}

function keywordScore(keyword: string): number {
  switch (keyword) {
    case "type":
      return 6;
    case "required":
    case "additionalProperties":
      return 5;
    case "discriminator":
      return 4;
    case "enum":
    case "const":
      return 3;
    case "oneOf":
      return 1;
    default:
      return 2;
  }
}

function firstRelevantError(errors: ErrorObject[] | null | undefined): ErrorObject | undefined {
  if (!errors || errors.length === 0) return undefined;
  const ranked = [...errors].sort((a, b) => {
    const depthDiff = errorDepth(b) - errorDepth(a);
    if (depthDiff !== 0) return depthDiff;
    return keywordScore(b.keyword) - keywordScore(a.keyword);
  });
  return ranked[0];
}

function parseInput(input: string | Uint8Array | object): unknown {
  try {
    if (typeof input === "string") {
      return JSON.parse(input);
    }
    if (input instanceof Uint8Array) {
      return JSON.parse(decoder.decode(input));
    }
  } catch (err) {
    throw new VmError("E_AST_TYPE", `/ invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return input;
}

/** Validates a tree handed over by the external parser. */
export function parseSourceUnit(input: string | Uint8Array | object): SourceUnit {
  const obj = parseInput(input);
  if (validateSourceUnit(obj)) {
    return obj;
  }
  const error = firstRelevantError(validateSourceUnit.errors);
  throw error ? mapError(error) : new VmError("E_AST_TYPE", "/");
}
