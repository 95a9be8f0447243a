import { openEngine, type Engine, type EngineOptions } from '../index.js';
import { fail } from './options.js';

/** Open the engine, run one command against it, and always close the database. */
export async function withEngine(
  options: EngineOptions,
  work: (engine: Engine) => Promise<void>,
  json = false,
): Promise<void> {
  let engine: Engine;
  try {
    engine = await openEngine(options);
  } catch (err) {
    fail(err, json);
  }
  try {
    await work(engine);
  } catch (err) {
    fail(err, json);
  } finally {
    engine.close();
  }
}
