/**
 * Live demo against the public endpoints.
 *
 * Usage:
 *   npm run demo
 *
 * Sends one chat message and generates one image into ./image.png.
 * Each step reports its own failure and the script carries on.
 */

import { PollinationsClient, PollinationsError, ImageModel } from "../index";

async function main(): Promise<void> {
  const client = new PollinationsClient();

  try {
    const response = await client.chat("Hi");
    console.log(`Chat Response: ${response}`);
  } catch (err) {
    if (!(err instanceof PollinationsError)) throw err;
    console.error(`Chat Error: ${err.message}`);
  }

  try {
    const result = await client.generateImage(
      "A red Dodge Challenger on a city street at night with neon lights",
      { model: ImageModel.FLUX_3D }
    );
    console.log(`Image Result: ${result}`);
  } catch (err) {
    if (!(err instanceof PollinationsError)) throw err;
    console.error(`Image Generation Error: ${err.message}`);
  }
}

main().catch((err: unknown) => {
  console.error("Demo failed:", err);
  process.exit(1);
});
