export type CodecFormat = "json" | "yaml";

export interface Codec {
  /** File extension of stored records, without the dot */
  readonly extension: string;
  encode(value: unknown): string;
  decode(text: string): unknown;
}
