import { readFile } from "node:fs/promises";
import { ConfigurationError, errorMessage } from "../errors.js";
import { type Credentials, credentialsSchema } from "./config-schema.js";

/**
 * Read a `{"user", "pass"}` credential file.
 * Any problem with the file is a ConfigurationError.
 */
export async function loadCredentials(path: string): Promise<Credentials> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read credential file ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Credential file ${path} is not valid JSON`, { cause: err });
  }

  const result = credentialsSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Credential file ${path} is invalid: ${issues}`);
  }
  return result.data;
}
