import { z } from "zod";
import { DEFAULT_DATA_ROOT } from "../repository/FileRepository.js";

export const StoreConfigSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_ROOT),
  format: z.enum(["json", "yaml"]).default("json"),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
