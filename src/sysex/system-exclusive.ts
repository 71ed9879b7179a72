import { ByteReader, checksum, toU7 } from "../bytes";
import type { ReceiverContext } from "../context";
import { byteOverflow, noEndOfSystemExclusiveFlag, undefinedSystemExclusiveMessage } from "../errors";
import { DeviceId, decodeDeviceId, deviceIdByte, ManufacturerId, pushManufacturerId, readManufacturerId } from "./ids";
import { hasChecksum, pushUniversalNonRealTime, readUniversalNonRealTime, UniversalNonRealTimeMsg } from "./non-real-time";
import { pushUniversalRealTime, readUniversalRealTime, UniversalRealTimeMsg } from "./real-time";

export type SystemExclusiveMsg =
  | { kind: "commercial"; id: ManufacturerId; data: number[] }
  | { kind: "nonCommercial"; data: number[] }
  | { kind: "universalRealTime"; device: DeviceId; msg: UniversalRealTimeMsg }
  | { kind: "universalNonRealTime"; device: DeviceId; msg: UniversalNonRealTimeMsg };

export const SYSEX_START = 0xf0;
export const SYSEX_END = 0xf7;
const NON_COMMERCIAL = 0x7d;
const UNIVERSAL_NON_REAL_TIME = 0x7e;
const UNIVERSAL_REAL_TIME = 0x7f;

export function pushSystemExclusive(msg: SystemExclusiveMsg, out: number[]): void {
  out.push(SYSEX_START);
  switch (msg.kind) {
    case "commercial":
      pushManufacturerId(msg.id, out);
      out.push(...msg.data.map(toU7));
      break;
    case "nonCommercial":
      out.push(NON_COMMERCIAL, ...msg.data.map(toU7));
      break;
    case "universalRealTime":
      out.push(UNIVERSAL_REAL_TIME, deviceIdByte(msg.device));
      pushUniversalRealTime(msg.msg, out);
      break;
    case "universalNonRealTime": {
      const start = out.length;
      out.push(UNIVERSAL_NON_REAL_TIME, deviceIdByte(msg.device));
      pushUniversalNonRealTime(msg.msg, out);
      if (hasChecksum(msg.msg)) {
        const last = out.length - 1;
        out[last] = checksum(out, start, last);
      }
      break;
    }
  }
  out.push(SYSEX_END);
}

export interface SystemExclusiveRead {
  msg: SystemExclusiveMsg;
  consumed: number;
}

/**
 * Decodes one sysex message from the head of `bytes`, through its F7. With `ctx.isSmfSysex`
 * the leading F0 is absent, as in the body of an SMF F0 event.
 */
export function decodeSystemExclusive(bytes: ArrayLike<number>, ctx: ReceiverContext): SystemExclusiveRead {
  const start = ctx.isSmfSysex ? 0 : 1;
  if (!ctx.isSmfSysex && bytes[0] !== SYSEX_START) throw undefinedSystemExclusiveMessage(bytes[0]);
  let end = -1;
  for (let i = start; i < bytes.length; i++) {
    if (bytes[i] === SYSEX_END) {
      end = i;
      break;
    }
    if (bytes[i] > 0x7f) throw byteOverflow();
  }
  if (end < 0) throw noEndOfSystemExclusiveFlag();
  const body: number[] = [];
  for (let i = start; i < end; i++) body.push(bytes[i]);
  return { msg: decodeSystemExclusiveBody(body, ctx), consumed: end + 1 };
}

function decodeSystemExclusiveBody(body: number[], ctx: ReceiverContext): SystemExclusiveMsg {
  if (body.length === 0) throw undefinedSystemExclusiveMessage();
  const reader = new ByteReader(body);
  switch (body[0]) {
    case NON_COMMERCIAL:
      return { kind: "nonCommercial", data: body.slice(1) };
    case UNIVERSAL_NON_REAL_TIME:
      reader.u7();
      return {
        kind: "universalNonRealTime",
        device: decodeDeviceId(reader.u7()),
        msg: readUniversalNonRealTime(body),
      };
    case UNIVERSAL_REAL_TIME: {
      reader.u7();
      const device = decodeDeviceId(reader.u7());
      return { kind: "universalRealTime", device, msg: readUniversalRealTime(reader, ctx) };
    }
    default: {
      const id = readManufacturerId(reader);
      return { kind: "commercial", id, data: reader.rest() };
    }
  }
}
