export { ByteReader, decodeIndex, loadIndexFile } from "./binaryReader.js";
export { ByteWriter, encodeIndex, writeIndexFile } from "./binaryWriter.js";
export { BooleanQueryEngine, type EngineDeps } from "./booleanQueryEngine.js";
export { BooleanQueryTokenizer } from "./booleanQueryTokenizer.js";
export {
  DEFAULT_URL_KEY,
  buildForwardTable,
  extractUrls,
  percentDecode,
  placeholderTitle,
  titleFromUrl,
} from "./documentMetadata.js";
export { IndexBuilder, type BuildOptions } from "./indexBuilder.js";
export { MemoryBooleanIndex } from "./memoryBooleanIndex.js";
export { complement, intersect, union } from "./postingsAlgebra.js";
export { PRECEDENCE, formatToken, insertImplicitAnd, toRpn } from "./queryParser.js";
export { SlowQueryLog, compareSlowest, type QueryTiming } from "./slowQueryLog.js";
export {
  MAX_DOC_ID,
  isSpace,
  parseTokenLine,
  readTokenStream,
  toLowerAscii,
  type TokenStreamStats,
} from "./tokenStream.js";
