import { nonInterferenceCases } from "./non_interference_cases";
import { persistenceCases } from "./persistence_cases";
import { routesCases } from "./routes_cases";
import { runtimeCases } from "./runtime_cases";

async function main(): Promise<void> {
  await persistenceCases();
  await runtimeCases();
  await nonInterferenceCases();
  await routesCases();
  console.log("server tests ok");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
