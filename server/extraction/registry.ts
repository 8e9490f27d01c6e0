import { pipelineIds, type PipelineDescriptor, type PipelineId } from "@shared/schema";
import type { Availability, PipelineAdapter } from "./types";
import { getErrorMessage } from "./errors";
import { createLogger } from "../logger";

const log = createLogger("registry");

/**
 * Pipelines known to this server and whether their libraries loaded.
 *
 * Availability is checked once at startup so a missing optional dependency
 * shows up as an unavailable pipeline instead of a crash on first use.
 */
export class PipelineRegistry {
  private adapters = new Map<PipelineId, PipelineAdapter>();
  private availability = new Map<PipelineId, Availability>();

  register(adapter: PipelineAdapter): this {
    this.adapters.set(adapter.id, adapter);
    this.availability.delete(adapter.id);
    return this;
  }

  async initialize(): Promise<void> {
    const adapters = Array.from(this.adapters.values());

    await Promise.all(
      adapters.map(async (adapter) => {
        try {
          await adapter.ensureAvailable();
          this.availability.set(adapter.id, { available: true });
          log.info("Pipeline available", { pipeline: adapter.id, description: adapter.description });
        } catch (error) {
          const reason = getErrorMessage(error, `${adapter.id} pipeline unavailable`);
          this.availability.set(adapter.id, { available: false, reason });
          log.warn("Pipeline unavailable", { pipeline: adapter.id, reason });
        }
      })
    );
  }

  get(id: PipelineId): PipelineAdapter | undefined {
    return this.adapters.get(id);
  }

  /**
   * Adapters not yet checked are assumed available; a failure then surfaces when
   * the pipeline runs.
   */
  getAvailability(id: PipelineId): Availability {
    if (!this.adapters.has(id)) {
      return { available: false, reason: `${id} pipeline is not registered` };
    }
    return this.availability.get(id) ?? { available: true };
  }

  supported(): PipelineId[] {
    return pipelineIds.filter((id) => this.adapters.has(id));
  }

  describe(): PipelineDescriptor[] {
    return this.supported().map((id) => {
      const availability = this.getAvailability(id);
      return availability.available
        ? { id, available: true }
        : { id, available: false, reason: availability.reason };
    });
  }
}
