import YAML from "yaml";
import type { Codec, CodecFormat } from "./types.js";

export const jsonCodec: Codec = {
  extension: "json",
  encode: (value) => JSON.stringify(value, null, 2),
  decode: (text) => JSON.parse(text),
};

export const yamlCodec: Codec = {
  extension: "yaml",
  encode: (value) => YAML.stringify(value),
  decode: (text) => YAML.parse(text),
};

const codecs: Record<CodecFormat, Codec> = {
  json: jsonCodec,
  yaml: yamlCodec,
};

export function getCodec(format: CodecFormat): Codec {
  return codecs[format];
}

export type { Codec, CodecFormat } from "./types.js";
