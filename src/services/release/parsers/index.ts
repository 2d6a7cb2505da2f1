export { StructuredReleaseParser } from "./structured-parser.js";
export { PatternReleaseParser } from "./pattern-parser.js";
export { selectReleaseParser } from "./select-parser.js";
export type { StructuredParserLoader } from "./select-parser.js";
export { ReleaseParseError, PARSER_PREFERENCES } from "./types.js";
export type { ReleaseParser, ParserPreference } from "./types.js";
