import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

const DATA_DIR = new URL("../../data/", import.meta.url);

const pointSchema = z.tuple([z.number().int(), z.number().int()]);

const skillSchema = z.enum([
  "Melee",
  "Firearms",
  "Pilot",
  "Repair",
  "Medicine",
  "Persuasion",
  "Empathy",
  "Observation",
  "Comms",
  "Deception",
  "Stealth",
]);

export const stationSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  layout: z.array(z.string()),
  rooms: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string(),
      glyph: z.string().length(1),
      flags: z.array(z.enum(["backupPower", "heated", "radio", "generator", "infirmary"])),
    }),
  ),
  vents: z.array(z.object({ a: pointSchema, b: pointSchema })),
  items: z.array(
    z.object({
      name: z.string().min(1),
      room: z.string(),
      damage: z.number().int().min(0),
      skill: skillSchema.optional(),
      throwNoise: z.number().int().positive().optional(),
    }),
  ),
  /** Items that only turn up through station events. */
  supplies: z
    .array(
      z.object({
        name: z.string().min(1),
        damage: z.number().int().min(0),
        skill: skillSchema.optional(),
        throwNoise: z.number().int().positive().optional(),
      }),
    )
    .optional(),
  devices: z
    .array(
      z.discriminatedUnion("kind", [
        z.object({
          id: z.string().min(1),
          kind: z.literal("camera"),
          room: z.string(),
          position: pointSchema,
          facing: z.enum(["N", "S", "E", "W"]),
          range: z.number().int().positive(),
        }),
        z.object({
          id: z.string().min(1),
          kind: z.literal("motionSensor"),
          room: z.string(),
          position: pointSchema,
        }),
      ]),
    )
    .optional(),
});

const attributesSchema = z.object({
  Prowess: z.number().int().min(0),
  Logic: z.number().int().min(0),
  Influence: z.number().int().min(0),
  Resolve: z.number().int().min(0),
});

export const crewMemberSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  role: z.string(),
  isPlayer: z.boolean().default(false),
  infected: z.boolean().optional(),
  attributes: attributesSchema,
  skills: z.record(skillSchema, z.number().int().min(0)).default({}),
  startRoom: z.string(),
  habitat: z.array(z.string()),
  schedule: z.array(
    z.object({
      start: z.number().int().min(0).max(23),
      end: z.number().int().min(0).max(23),
      room: z.string(),
    }),
  ),
});

export const crewSchema = z.object({ crew: z.array(crewMemberSchema).min(1) });

export const recipeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  ingredients: z.array(z.string()).min(1),
  craftTime: z.number().int().positive(),
  damage: z.number().int().min(0).default(0),
  skill: skillSchema.optional(),
});

export const recipesSchema = z.object({ recipes: z.array(recipeSchema) });

export type StationDefinition = z.infer<typeof stationSchema>;
export type CrewMemberDefinition = z.input<typeof crewMemberSchema>;
export type CrewMember = z.infer<typeof crewMemberSchema>;
export type Recipe = z.infer<typeof recipeSchema>;

function readData<S extends z.ZodTypeAny>(file: string, schema: S): z.infer<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(new URL(file, DATA_DIR), "utf8"));
  } catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err));
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(file, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return parsed.data;
}

export function loadStationDefinition(): StationDefinition {
  return readData("station.json", stationSchema);
}

export function loadCrewRoster(): CrewMember[] {
  return readData("crew.json", crewSchema).crew;
}

export function loadRecipes(): Recipe[] {
  return readData("recipes.json", recipesSchema).recipes;
}

/** Parses caller-supplied crew definitions with the same rules as the bundled roster. */
export function parseCrew(crew: CrewMemberDefinition[]): CrewMember[] {
  const parsed = z.array(crewMemberSchema).safeParse(crew);
  if (!parsed.success) {
    throw new ConfigError("crew", parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return parsed.data;
}
