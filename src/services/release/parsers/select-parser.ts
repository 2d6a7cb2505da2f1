/**
 * Startup capability probe choosing the release parser.
 */

import { ConfigError, getErrorMessage } from "../../errors.js";
import type { Logger } from "../../logging/index.js";
import { PatternReleaseParser } from "./pattern-parser.js";
import type { ParserPreference, ReleaseParser } from "./types.js";

/**
 * Loads the structured implementation. Replaceable for tests.
 */
export type StructuredParserLoader = () => Promise<ReleaseParser>;

const loadStructuredParser: StructuredParserLoader = async () => {
  const { StructuredReleaseParser } = await import("./structured-parser.js");
  return new StructuredReleaseParser();
};

/**
 * Pick a parser for the given preference.
 *
 * `auto` tries the structured parser and degrades to pattern matching when it
 * cannot be loaded; `structured` makes that failure fatal.
 *
 * @throws ConfigError when `structured` is requested and cannot be loaded
 */
export async function selectReleaseParser(
  preference: ParserPreference,
  logger: Logger,
  load: StructuredParserLoader = loadStructuredParser
): Promise<ReleaseParser> {
  if (preference === "pattern") {
    logger.debug("Using pattern release parser", { reason: "requested" });
    return new PatternReleaseParser();
  }

  try {
    return await load();
  } catch (error) {
    if (preference === "structured") {
      throw new ConfigError(`Structured release parser unavailable: ${getErrorMessage(error)}`, [
        "Unset SQUIRREL_PARSER to fall back to pattern matching.",
      ]);
    }
    logger.warn("Structured release parser unavailable, using pattern matching", {
      error: getErrorMessage(error),
    });
    return new PatternReleaseParser();
  }
}
