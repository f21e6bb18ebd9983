import { z } from "zod";
import { MAX_BPM, MIN_BPM } from "../constants/timing.js";

/**
 * zod schemas for the object-shaped parts of the JSON piece format.
 *
 * `start` and `notes` are left as `unknown` here: their grammar depends on
 * earlier tracks and on the track's scale, so the piece parser reads them.
 */

const integer = (field: string) =>
  z
    .number({ required_error: `${field} missing`, invalid_type_error: `${field} should be a number` })
    .int(`${field} should be an integer`);

const integerBetween = (field: string, min: number, max: number) =>
  integer(field)
    .min(min, `${field} should be between ${min} and ${max}`)
    .max(max, `${field} should be between ${min} and ${max}`);

const present = (field: string) => z.unknown().refine((value) => value !== undefined, `${field} missing`);

export const PieceHeaderSchema = z.object(
  {
    bpm: integerBetween("bpm", MIN_BPM, MAX_BPM),
    tracks: z.array(z.unknown(), {
      required_error: "tracks missing",
      invalid_type_error: "tracks should be an array"
    })
  },
  { required_error: "piece missing", invalid_type_error: "piece should be a JSON object" }
);
export type PieceHeaderJson = z.infer<typeof PieceHeaderSchema>;

export const TrackSchema = z.object(
  {
    id: z
      .string({ required_error: "id missing", invalid_type_error: "id should be a string" })
      .min(1, "id should not be empty"),
    scale: z.string({ required_error: "scale missing", invalid_type_error: "scale should be a string" }),
    octave: integerBetween("octave", -1, 9),
    start: present("start"),
    notes: present("notes"),
    program: integerBetween("program", 0, 127).optional(),
    velocity: integerBetween("velocity", 1, 127).optional()
  },
  { required_error: "track missing", invalid_type_error: "each track should be a JSON object" }
);
export type TrackJson = z.infer<typeof TrackSchema>;
