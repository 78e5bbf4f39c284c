/**
 * Render targets
 *
 * A target turns the loaded event into render tasks. The tasks are handed to the template renderer
 * unchanged, so their args are opaque here.
 */

import type { Event } from '../graph/event.js';

export interface RenderTask {
  /** Template file to render, relative to the template directory */
  templateName: string;
  /** Output file name without extension */
  jobName: string;
  args: Record<string, unknown>;
  /** Run the document compiler twice (for references and page counts) */
  doubleTex: boolean;
  /** Overrides the output directory of the run */
  outputDir?: string;
}

export interface TargetContext {
  outputDir: string;
  /** Optional filter expression given on the command line */
  match: string | null;
  /** Country spellings left out of address blocks */
  homeCountries: readonly string[];
}

export type TargetFunction = (event: Event, context: TargetContext) => RenderTask[];

export interface RenderTarget {
  name: string;
  description: string;
  run: TargetFunction;
}

export class TargetRegistry {
  private readonly targets = new Map<string, RenderTarget>();

  register(name: string, description: string, run: TargetFunction): this {
    if (this.targets.has(name)) {
      throw new Error(`Render target '${name}' is already registered`);
    }
    this.targets.set(name, { name, description, run });
    return this;
  }

  get(name: string): RenderTarget | undefined {
    return this.targets.get(name);
  }

  /** Registered targets in registration order */
  list(): RenderTarget[] {
    return [...this.targets.values()];
  }
}
