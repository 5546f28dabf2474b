import { z } from "zod";

export const segmentOptionsSchema = z.object({
  fps: z.number().finite().positive(),
  /** Frames added before each range start (negative removes frames) */
  extraFramesStart: z.number().int(),
  /** Frames added after each range end (negative removes frames) */
  extraFramesEnd: z.number().int(),
  addSegmentNumber: z.boolean(),
  /** Round emitted seconds to this many decimals; unset keeps full precision */
  decimals: z.number().int().min(0).max(9).optional(),
});

export const convertConfigSchema = segmentOptionsSchema.extend({
  sourcePath: z.string().min(1, "source path is required"),
  destinationPath: z.string().min(1, "destination path is required"),
  mediaFileName: z.string().min(1, "media filename is required"),
  overwrite: z.boolean().default(true),
});

export type SegmentOptions = Readonly<z.infer<typeof segmentOptionsSchema>>;
export type ConvertConfig = Readonly<z.infer<typeof convertConfigSchema>>;
export type ConvertConfigInput = z.input<typeof convertConfigSchema>;
