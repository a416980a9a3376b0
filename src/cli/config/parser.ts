/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import Ajv, { type SchemaObject } from "ajv";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { CouchLiftConfigFile } from "./types.js";

const positiveInteger = { type: "integer", minimum: 1 };

const configFileSchema: SchemaObject = {
  type: "object",
  additionalProperties: false,
  properties: {
    source: { type: "string" },
    target: { type: "string" },
    credentials: {
      type: "object",
      additionalProperties: false,
      properties: {
        login: { type: "string" },
        password: { type: "string" },
      },
      required: ["login", "password"],
    },
    requestTimeoutSeconds: positiveInteger,
    replicate: {
      type: "object",
      additionalProperties: false,
      properties: {
        filterDeleted: { type: "boolean" },
        stallTimeoutSeconds: positiveInteger,
        pollIntervalMs: positiveInteger,
      },
    },
    rebuild: {
      type: "object",
      additionalProperties: false,
      properties: {
        timeoutSeconds: positiveInteger,
        views: { type: "array", items: { type: "string" } },
      },
    },
    delete: {
      type: "object",
      additionalProperties: false,
      properties: {
        force: { type: "boolean" },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<CouchLiftConfigFile>(configFileSchema);

/**
 * Check a parsed document against the config file schema
 */
export function validateConfigDocument(
  document: unknown,
  filePath: string,
): CouchLiftConfigFile {
  // An empty YAML file parses to null
  const candidate = document ?? {};
  if (validateConfigFile(candidate)) {
    return candidate;
  }
  const problems = (validateConfigFile.errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
  );
  throw new ConfigError(`Invalid config file: ${filePath}`, { problems });
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): CouchLiftConfigFile {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = validateConfigDocument(document, filePath);

  logger.info("Configuration file parsed successfully", {
    hasCredentials: !!config.credentials,
    hasReplicateConfig: !!config.replicate,
    hasRebuildConfig: !!config.rebuild,
    hasDeleteConfig: !!config.delete,
  });

  return config;
}
