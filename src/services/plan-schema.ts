import { z } from "zod";

export const CHANNEL_COUNT = 3;
export const MAX_FIELDS = 24;
export const MAX_STEPS = 16;
export const MAX_DECODE = 10;
export const MAX_REGS_PER_STEP = 32;

export const DECODE_TYPES = ["u16", "s16", "u32be", "s32be", "f32be"] as const;

export type DecodeType = (typeof DECODE_TYPES)[number];

/** Registers consumed by one decoded value. */
export function decodeWidth(type: DecodeType): number {
  return type === "u16" || type === "s16" ? 1 : 2;
}

const channelSchema = z.object({
  gpio: z.number().int().min(0),
  active_high: z.boolean().default(true),
  warmup_ms: z.number().int().min(0).default(800)
});

const decodeSchema = z.object({
  idx: z.number().int(),
  type: z.enum(DECODE_TYPES),
  reg_ofs: z.number().int(),
  scale: z.number().finite().default(1),
  offset: z.number().finite().default(0)
});

const modbusSchema = z.object({
  addr: z.number().int().min(0).max(255),
  reg: z.number().int().min(0).max(65535),
  count: z.number().int().min(1).max(MAX_REGS_PER_STEP),
  timeout_ms: z.number().int().min(1).default(200)
});

const stepSchema = z.object({
  ch: z.number().int().min(0).max(CHANNEL_COUNT - 1),
  modbus: modbusSchema,
  decode: z.array(decodeSchema).min(1).max(MAX_DECODE)
});

/**
 * Acquisition plan pushed to field units: which channel to power, which
 * Modbus registers to read per step, and how to decode them into `fields`.
 * Unknown keys are dropped.
 */
export const planSchema = z
  .object({
    ver: z.number().int().min(0).default(0),
    channels: z.array(channelSchema).length(CHANNEL_COUNT),
    fields: z.array(z.string().min(1).max(32)).min(1).max(MAX_FIELDS),
    steps: z.array(stepSchema).min(1).max(MAX_STEPS)
  })
  .superRefine((plan, ctx) => {
    plan.steps.forEach((step, stepIndex) => {
      step.decode.forEach((decode, decodeIndex) => {
        if (decode.idx < 0 || decode.idx >= plan.fields.length) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["steps", stepIndex, "decode", decodeIndex, "idx"],
            message: "decode.idx out of range"
          });
        }
        if (decode.reg_ofs < 0 || decode.reg_ofs + decodeWidth(decode.type) > step.modbus.count) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["steps", stepIndex, "decode", decodeIndex, "reg_ofs"],
            message: "decode.reg_ofs out of range"
          });
        }
      });
    });
  });

export type Plan = z.infer<typeof planSchema>;
