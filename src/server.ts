import { createApp } from "./app";
import { MODEL_VERSION } from "./predictor";

async function main(): Promise<void> {
  const server = createApp();

  const port = Number.parseInt(process.env.PORT || "3000", 10);
  server.listen(port, () => {
    console.log(`Risk engine ${MODEL_VERSION} ready on http://localhost:${port}`);
  });
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
