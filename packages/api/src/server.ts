import { createHTTPServer } from "@trpc/server/adapters/standalone";
import cors from "cors";
import { isDifficulty } from "@whiteout/simulation";
import { appRouter } from "./app-router.js";
import { SimulationService } from "./simulation-service.js";
import { SqliteEventStore } from "./event-store/sqlite-event-store.js";
import type { Context } from "./trpc.js";

const PORT = Number(process.env.PORT) || 3001;

async function main() {
  const seed = process.env.WHITEOUT_SEED || `${Date.now()}`;
  const difficulty = process.env.WHITEOUT_DIFFICULTY ?? "normal";
  if (!isDifficulty(difficulty)) {
    throw new Error(`WHITEOUT_DIFFICULTY must be easy, normal or hard (got '${difficulty}')`);
  }

  const eventStore = new SqliteEventStore(process.env.WHITEOUT_DB_PATH); // in-memory SQLite unless a path is set
  const simulation = new SimulationService(eventStore, { seed, difficulty });

  console.log(`Crew of ${simulation.getAgents().length} aboard, ${simulation.getRooms().length} rooms`);
  console.log(`Simulation engine ready at turn ${simulation.currentTurn}`);

  const server = createHTTPServer({
    middleware: cors(),
    router: appRouter,
    createContext: (): Context => ({ simulation }),
  });

  server.listen(PORT);
  console.log(`API server listening on http://localhost:${PORT}`);
}

main().catch(console.error);
