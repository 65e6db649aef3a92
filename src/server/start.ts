import { startWsServer } from "./wsServer";

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`${name} must be an integer, got "${raw}".`);
  return n;
}

function envFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name} must be true or false, got "${raw}".`);
}

function main() {
  const port = envInt("CARROM_WS_PORT", 8787);
  const playerCount = envInt("CARROM_PLAYER_COUNT", 2);
  if (playerCount !== 2 && playerCount !== 4) {
    throw new Error(`CARROM_PLAYER_COUNT must be 2 or 4, got ${playerCount}.`);
  }
  const passTurnOnMiss = envFlag("CARROM_PASS_TURN_ON_MISS", true);
  const saveDir = process.env.CARROM_SAVE_DIR ?? ".carrom-saves";

  const server = startWsServer({
    port,
    playerCount,
    rules: { passTurnOnMiss },
    saveDir,
    // eslint-disable-next-line no-console
    log: (line) => console.log(`[carrom] ${line}`),
  });
  // eslint-disable-next-line no-console
  console.log(`Carrom WS server listening on ws://localhost:${server.port}`);
}

try {
  main();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
}
