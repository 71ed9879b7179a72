import { z } from "zod";
import { createTimeCode, TimeCode } from "./time-code";

/** The high nibble of the last channel status byte (0x8 to 0xE) and its channel (1 to 16). */
export interface ChannelStatus {
  status: number;
  channel: number;
}

/** Raw controller/value bytes behind the last assembled control change. */
export interface PreviousControl {
  channel: number;
  bytes: number[];
}

export interface PendingHighResVelocity {
  channel: number;
  lsb: number;
}

/**
 * Parser state threaded through `decodeWithContext`. One context per input stream.
 * Plain data: copy it with `cloneReceiverContext`, persist it with `snapshotReceiverContext`.
 */
export interface ReceiverContext {
  previousChannelStatus: ChannelStatus | null;
  previousControl: PreviousControl | null;
  pendingHighResVelocity: PendingHighResVelocity | null;
  /** Rolling time code, rebuilt from quarter frames and full time code messages. */
  timeCode: TimeCode;
  /** Sysex bodies arrive without their leading 0xF0 (SMF 0xF0 events). */
  isSmfSysex: boolean;
  /** 0xFF starts a meta event instead of meaning System Reset. */
  parsingSmf: boolean;
  complexCc: boolean;
  /** Head of a message cut short by an interleaved real-time byte. */
  interrupted: number[];
}

export interface ReceiverContextOptions {
  complexCc?: boolean;
  parsingSmf?: boolean;
}

export function createReceiverContext(options?: ReceiverContextOptions): ReceiverContext {
  return {
    previousChannelStatus: null,
    previousControl: null,
    pendingHighResVelocity: null,
    timeCode: createTimeCode(),
    isSmfSysex: false,
    parsingSmf: options?.parsingSmf ?? false,
    complexCc: options?.complexCc ?? false,
    interrupted: [],
  };
}

export function cloneReceiverContext(ctx: ReceiverContext): ReceiverContext {
  return {
    previousChannelStatus: ctx.previousChannelStatus ? { ...ctx.previousChannelStatus } : null,
    previousControl: ctx.previousControl
      ? { channel: ctx.previousControl.channel, bytes: [...ctx.previousControl.bytes] }
      : null,
    pendingHighResVelocity: ctx.pendingHighResVelocity ? { ...ctx.pendingHighResVelocity } : null,
    timeCode: { ...ctx.timeCode },
    isSmfSysex: ctx.isSmfSysex,
    parsingSmf: ctx.parsingSmf,
    complexCc: ctx.complexCc,
    interrupted: [...ctx.interrupted],
  };
}

const u7 = z.number().int().min(0).max(0x7f);
const channel = z.number().int().min(1).max(16);

export const receiverContextSchema = z.object({
  previousChannelStatus: z.object({ status: z.number().int().min(0x8).max(0xe), channel }).nullable(),
  previousControl: z.object({ channel, bytes: z.array(u7) }).nullable(),
  pendingHighResVelocity: z.object({ channel, lsb: u7 }).nullable(),
  timeCode: z.object({
    frames: z.number().int().min(0).max(29),
    seconds: z.number().int().min(0).max(59),
    minutes: z.number().int().min(0).max(59),
    hours: z.number().int().min(0).max(23),
    codeType: z.enum(["fps24", "fps25", "df30", "ndf30"]),
  }),
  isSmfSysex: z.boolean(),
  parsingSmf: z.boolean(),
  complexCc: z.boolean(),
  interrupted: z.array(z.number().int().min(0).max(0xff)),
});

export type ReceiverContextSnapshot = z.infer<typeof receiverContextSchema>;

export interface ContextIssue {
  field: string;
  message: string;
}

export function snapshotReceiverContext(ctx: ReceiverContext): ReceiverContextSnapshot {
  return cloneReceiverContext(ctx);
}

/** Lists every problem with an untrusted snapshot. Empty when it is valid. */
export function validateReceiverContext(snapshot: unknown): ContextIssue[] {
  const result = receiverContextSchema.safeParse(snapshot);
  if (result.success) return [];
  return result.error.issues.map(issue => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

export function restoreReceiverContext(snapshot: unknown): ReceiverContext {
  const result = receiverContextSchema.safeParse(snapshot);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join(".") || "root"}: ${issue.message}`);
    throw new RangeError(`Invalid receiver context snapshot: ${issues.join("; ")}`);
  }
  return cloneReceiverContext(result.data);
}
