import { loadConfig } from "../config";
import { InputLogger, type LogSink } from "../engine";
import { SimulatedDriverStation } from "../hardware/simulatedDriverStation";
import { startLogServer } from "../server/logServer";
import { FileLogSink, FileReplaySource } from "../server/persistence";
import { log, setLogLevel } from "../util/log";
import { runFixedRate } from "./loop";
import { DemoRobot } from "./robot";
import { setUpScenario } from "./simScenario";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const replaySource = config.replayPath ? FileReplaySource.load(config.replayPath) : undefined;
  const replayActive = replaySource !== undefined;

  const sinks: LogSink[] = [];
  if (config.logPath) {
    sinks.push(
      new FileLogSink({
        filePath: config.logPath,
        metadata: replayActive ? { mode: "replay", source: config.replayPath ?? "" } : { mode: "record" },
      })
    );
  }
  if (config.livePort !== undefined) {
    sinks.push(await startLogServer({ port: config.livePort, replayActive }));
  }

  const logger = new InputLogger({ replaySource, sinks });

  let sim: SimulatedDriverStation | undefined;
  if (!replayActive) {
    sim = new SimulatedDriverStation();
    setUpScenario(sim);
  }

  const robot = new DemoRobot(logger, sim, {
    periodMs: config.periodMs,
    maxCycles: config.cycles,
  });

  log.info(
    "Run options:",
    JSON.stringify(
      {
        mode: replayActive ? "replay" : "record",
        periodMs: config.periodMs,
        cycles: config.cycles,
        logPath: config.logPath ?? null,
        livePort: config.livePort ?? null,
      },
      null,
      2
    )
  );

  // Replay runs as fast as possible; record mode holds the fixed period.
  const loop = runFixedRate(replayActive ? 0 : config.periodMs, () => robot.cycle());
  process.once("SIGINT", () => loop.stop());

  try {
    await loop.done;
  } finally {
    await logger.close();
  }
  log.info(`stopped after ${logger.cyclesCompleted} cycle(s)`);
}

main().catch((err) => {
  log.error(err);
  process.exit(1);
});
