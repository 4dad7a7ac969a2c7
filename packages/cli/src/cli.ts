#!/usr/bin/env tsx
import { listModels, lookupModel, reachModel, runModel, type Output } from "./commands.js";
import { parseReachOptions, parseRunOptions, UsageError } from "./options.js";

function usage(): never {
  console.log(`Usage: retort <command> [options]

Commands:
  list                         Show the registered process models
  run <model>                  Auto-run a model and print the result
  reach <model> --goal <goal>  Search for a firing sequence reaching <goal>

Run options:
  --steps N                    Iterations to run (default 50, env RETORT_STEPS)
  --policy random|prioritise   Transition choice (default random, env RETORT_POLICY)
  --verbose                    Log every firing attempt

Reach options:
  --goal <place>[>=n]          Place that must hold at least n tokens (default 1)
  --max-depth N                Longest sequence explored (default 8)
  --max-states N               Stop after visiting N states (default unbounded)

  --help                       Show this help`);
  process.exit(0);
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help")) {
    usage();
  }

  const out: Output = { log: (line) => console.log(line) };
  const [command, model] = args;

  switch (command) {
    case "list":
      listModels(out);
      return;
    case "run":
    case "reach": {
      if (!model || model.startsWith("--")) {
        throw new UsageError("model name required");
      }
      const definition = lookupModel(model);
      if (command === "run") {
        runModel(definition, parseRunOptions(args), out);
      } else {
        const options = parseReachOptions(args);
        const result = reachModel(definition, options, out);
        if (result.sequence === null) process.exitCode = 1;
      }
      return;
    }
    default:
      console.error(`Unknown command: ${command}`);
      console.error("Available commands: list, run, reach");
      process.exit(1);
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
