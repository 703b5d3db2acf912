import { TRPCError } from "@trpc/server";
import { SnapshotError, isDifficulty, type Action, type Difficulty } from "@whiteout/simulation";
import { z } from "zod";
import { router, publicProcedure } from "../trpc.js";

const id = z.string().min(1);
const step = z.number().int().min(-1).max(1);

const actionSchema: z.ZodType<Action> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("wait") }),
  z.object({ kind: z.literal("move"), dx: step, dy: step }),
  z.object({ kind: z.literal("posture"), posture: z.enum(["Standing", "Crouching", "Crawling", "Hiding"]) }),
  z.object({ kind: z.literal("takeCover"), cover: z.enum(["None", "Light", "Heavy", "Full"]) }),
  z.object({ kind: z.literal("pickUp"), item: z.string().min(1) }),
  z.object({ kind: z.literal("drop"), item: z.string().min(1) }),
  z.object({ kind: z.literal("attack"), targetId: id }),
  z.object({ kind: z.literal("bloodTest"), targetId: id }),
  z.object({ kind: z.literal("tagEvidence"), targetId: id }),
  z.object({ kind: z.literal("interrogate"), targetId: id }),
  z.object({ kind: z.literal("accuse"), targetId: id }),
  z.object({ kind: z.literal("assimilate"), targetId: id }),
  z.object({ kind: z.literal("craft"), recipeId: id }),
  z.object({ kind: z.literal("cancelCraft") }),
  z.object({ kind: z.literal("sendSos") }),
  z.object({ kind: z.literal("barricade") }),
  z.object({ kind: z.literal("breakBarricade"), roomId: id }),
  z.object({ kind: z.literal("restorePower") }),
  z.object({ kind: z.literal("throw"), item: z.string().min(1), dx: step, dy: step }),
  z.object({ kind: z.literal("sabotageDevice"), deviceId: id }),
  z.object({ kind: z.literal("checkConsole") }),
]);

const difficultySchema = z
  .string()
  .refine(isDifficulty, { message: "Expected easy, normal or hard" });

export const simulationRouter = router({
  applyAction: publicProcedure
    .input(z.object({ agentId: id, action: actionSchema }))
    .mutation(({ ctx, input }) => {
      return ctx.simulation.applyAction(input.agentId, input.action);
    }),

  advanceTurn: publicProcedure.mutation(({ ctx }) => {
    return ctx.simulation.advanceTurn();
  }),

  snapshot: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.snapshot();
  }),

  restore: publicProcedure
    .input(z.object({ snapshot: z.unknown() }))
    .mutation(({ ctx, input }) => {
      try {
        return ctx.simulation.restore(input.snapshot);
      } catch (err) {
        if (err instanceof SnapshotError) {
          throw new TRPCError({ code: "BAD_REQUEST", message: err.message, cause: err });
        }
        throw err;
      }
    }),

  reset: publicProcedure
    .input(z.object({ seed: z.string().min(1), difficulty: difficultySchema.optional() }))
    .mutation(({ ctx, input }) => {
      return ctx.simulation.reset(input);
    }),

  getEventLog: publicProcedure
    .input(
      z.object({
        agentId: z.string().optional(),
        type: z.string().optional(),
        fromTurn: z.number().int().min(0).optional(),
        toTurn: z.number().int().min(0).optional(),
      }),
    )
    .query(({ ctx, input }) => {
      return ctx.simulation.getEventLog(input);
    }),

  getAgents: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getAgents();
  }),

  getState: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getState();
  }),
});
