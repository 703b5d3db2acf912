import { router } from "./trpc.js";
import { simulationRouter } from "./routers/simulation.js";
import { stationRouter } from "./routers/station.js";

export const appRouter = router({
  simulation: simulationRouter,
  station: stationRouter,
});

export type AppRouter = typeof appRouter;
