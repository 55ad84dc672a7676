export {
  cloneJson,
  isJsonObject,
  jsonEqual,
  type JsonArray,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
} from './json.js';
