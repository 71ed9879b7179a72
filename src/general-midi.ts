import { z } from "zod";
import table from "./data/general-midi.json";

const generalMidiSchema = z.object({
  soundSet: z.array(z.string().min(1)).length(128),
  percussionFirstNote: z.number().int().min(0).max(0x7f),
  percussionMap: z.array(z.string().min(1)),
});

const GM = generalMidiSchema.parse(table);

/** General MIDI 1 instrument name of a program (0 to 127). */
export function gmProgramName(program: number): string | undefined {
  return Number.isInteger(program) ? GM.soundSet[program] : undefined;
}

/** Program number of a General MIDI 1 instrument name, case-insensitive. */
export function gmProgramNumber(name: string): number | undefined {
  const wanted = name.toLowerCase();
  const index = GM.soundSet.findIndex(entry => entry.toLowerCase() === wanted);
  return index < 0 ? undefined : index;
}

/** Percussion sound on channel 10 for a note, from 35 (acoustic bass drum) to 81. */
export function gmPercussionName(note: number): string | undefined {
  if (!Number.isInteger(note)) return undefined;
  return GM.percussionMap[note - GM.percussionFirstNote];
}

export const GM_PERCUSSION_CHANNEL = 10;
