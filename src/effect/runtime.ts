import { Layer, ManagedRuntime } from "effect";
import type { Config } from "../config.ts";
import { makeLibraryIndexLayer } from "../library/library-index.ts";
import type { LibraryIndexOptions } from "../library/library-index.ts";
import type { AppRuntime } from "../routes/index.ts";
import { makeBaseLayer } from "./services.ts";

// Library index on top of the live services, all of them exposed
export const makeLiveLayer = (config: Config, options: LibraryIndexOptions = {}) =>
  makeLibraryIndexLayer(options).pipe(Layer.provideMerge(makeBaseLayer(config)));

export const makeRuntime = (config: Config, options: LibraryIndexOptions = {}): AppRuntime =>
  ManagedRuntime.make(makeLiveLayer(config, options));
