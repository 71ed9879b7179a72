import { ByteReader, clampInt, toU7 } from "../bytes";

/** A one-byte manufacturer id, or the three-byte extended form starting with 0x00. */
export type ManufacturerId = [number] | [0, number, number];

/** Target device of a universal message; "allCall" (0x7F) addresses every device. */
export type DeviceId = "allCall" | number;

const ALL_CALL = 0x7f;
const LAST_MANUFACTURER_ID = 0x7c;

export function pushManufacturerId(id: ManufacturerId, out: number[]): void {
  if (id.length === 1) {
    out.push(clampInt(id[0], 1, LAST_MANUFACTURER_ID));
    return;
  }
  out.push(0x00, toU7(id[1]), toU7(id[2]));
}

export function readManufacturerId(reader: ByteReader): ManufacturerId {
  const first = reader.u7();
  if (first !== 0x00) return [first];
  const second = reader.u7();
  return [0, second, reader.u7()];
}

export function deviceIdByte(device: DeviceId): number {
  return device === "allCall" ? ALL_CALL : clampInt(device, 0, ALL_CALL - 1);
}

export function decodeDeviceId(byte: number): DeviceId {
  return byte === ALL_CALL ? "allCall" : byte;
}
