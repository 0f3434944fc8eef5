import { runSelfPlay } from "./driver/selfPlay.ts";
import { isDraughtsError } from "./game/errors.ts";
import { loadEnv } from "./shared/env.ts";

function main(): number {
  try {
    runSelfPlay(loadEnv(process.env));
    return 0;
  } catch (err) {
    const msg = isDraughtsError(err) ? `${err.code}: ${err.message}` : String(err);
    console.error("[draughts] self-play failed", msg);
    return 1;
  }
}

process.exitCode = main();
