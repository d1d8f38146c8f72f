#!/usr/bin/env node

// Dispatcher script for running different examples
// Usage:
//   npm run example           - Run basic example (default)
//   npm run example -- [type] - Run a specific example
//
// Types:
//   basic       Rolling, tracing and reusing parsed expressions
//   traces      List expansions, sequences and error reporting
//   list        Show detailed descriptions

const arg = process.argv[2];

async function runExample(modulePath: string, message: string) {
  console.log(`${message}\n`);
  await import(modulePath);
}

function showList() {
  console.log("Available Examples:\n");
  console.log("  basic       - Rolling, tracing and reusing parsed expressions");
  console.log(
    "                Shows the one-call roll() API and the parse/evaluate/render steps\n"
  );

  console.log("  traces      - List expansions, sequences and errors");
  console.log(
    "                Prints multi-line traces and the errors raised for bad notation\n"
  );

  console.log("Usage:");
  console.log("  npm run example           - Run basic example (default)");
  console.log("  npm run example -- [type] - Run a specific example\n");
}

async function main() {
  switch (arg) {
    case "traces":
      await runExample("./trace-examples", "Running trace examples...");
      break;

    case "basic":
      await runExample("./basic-usage", "Running basic usage example...");
      break;

    case "list":
      showList();
      break;

    case undefined:
      await runExample(
        "./basic-usage",
        "Running basic usage example (default)..."
      );
      break;

    default:
      console.error(`Unknown example type: ${arg}\n`);
      showList();
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
