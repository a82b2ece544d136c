/**
 * Camera probe: scans device indexes and writes what works to a JSON file
 *
 *   npm run probe -- --max-index 5 --output camera_info.json
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { createCaptureBackends, discoverCameras, indexRange } from '@tankview/capture';
import { createChildLogger, errorMessage, getConfig } from '@tankview/shared';

const logger = createChildLogger({ component: 'Probe' });

const argsSchema = z.object({
  maxIndex: z.coerce.number().int().min(0).default(9),
  output: z.string().min(1).default('camera_info.json'),
});

async function main() {
  const { values } = parseArgs({
    options: {
      'max-index': { type: 'string' },
      output: { type: 'string', short: 'o' },
    },
  });
  const args = argsSchema.parse({ maxIndex: values['max-index'], output: values.output });
  const config = getConfig();

  const backends = createCaptureBackends({ mode: config.capture.mode, ffmpegPath: config.capture.ffmpegPath });
  const results = await discoverCameras(indexRange(args.maxIndex), backends, {
    probeAttempts: config.capture.probeAttempts,
    readTimeoutMs: config.capture.readTimeoutMs,
  });

  const working = results.filter((r) => r.working);
  const outputPath = resolve(process.cwd(), args.output);
  await writeFile(
    outputPath,
    JSON.stringify({ probedAt: new Date().toISOString(), cameras: working }, null, 2) + '\n'
  );

  logger.info(
    { working: working.map((c) => c.index), output: outputPath },
    `Found ${working.length} working camera(s)`
  );
}

main().catch((err) => {
  logger.error({ error: errorMessage(err) }, 'Probe failed');
  process.exit(1);
});
