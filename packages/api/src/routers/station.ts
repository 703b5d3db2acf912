import { router, publicProcedure } from "../trpc.js";

export const stationRouter = router({
  getRooms: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.getRooms();
  }),
});
