import type { FastifyBaseLogger } from "fastify";
import type { RenderedConfig } from "../db/telemetry-store";
import type { RetainedPublisher } from "./mqtt-publisher";
import { canonicalJson, configMetaPayload, crc32Hex } from "./plan-codec";
import type { Plan } from "./plan-schema";

export type ConfigTopics = {
  config: string;
  meta: string;
};

export type PublishedConfig = {
  ver: number;
  cc: string;
  topics: ConfigTopics;
};

export function configTopics(hardwareId: string): ConfigTopics {
  return {
    config: `/sensors/config/${hardwareId}`,
    meta: `/sensors/config-meta/${hardwareId}`
  };
}

/** Canonical plan text for `ver`, with `ver` stamped into the plan, and its CRC-32. */
export function renderPlan(plan: Plan, ver: number): RenderedConfig {
  const json = canonicalJson({ ...plan, ver });
  return { json, cc: crc32Hex(json) };
}

/** The version currently retained on a device's topics, put back when a new pair fails half way. */
export type RetainedConfig = RenderedConfig & { ver: number };

/**
 * Emits a plan as two retained messages: the canonical plan on the config
 * topic, then `{ver, cc}` on the meta topic. The meta message is only sent
 * once the broker acknowledged the plan. If the meta message fails, the
 * config topic is put back to `previous` (or cleared when there is none) so
 * it never holds a plan the meta topic does not describe.
 */
export class ConfigPublisher {
  constructor(
    private readonly publisher: RetainedPublisher,
    private readonly logger?: FastifyBaseLogger
  ) {}

  async publish(
    hardwareId: string,
    plan: Plan,
    ver: number,
    previous: RetainedConfig | null = null
  ): Promise<PublishedConfig> {
    return this.publishRendered(hardwareId, ver, renderPlan(plan, ver), previous);
  }

  async publishRendered(
    hardwareId: string,
    ver: number,
    rendered: RenderedConfig,
    previous: RetainedConfig | null = null
  ): Promise<PublishedConfig> {
    const topics = configTopics(hardwareId);
    await this.publisher.connect();
    await this.publisher.publishRetained(topics.config, rendered.json);
    try {
      await this.publisher.publishRetained(topics.meta, configMetaPayload(ver, rendered.cc));
    } catch (error) {
      await this.restorePlan(hardwareId, topics, previous);
      throw error;
    }
    this.logger?.info({ hardware_id: hardwareId, ver, cc: rendered.cc }, "config_published");
    return { ver, cc: rendered.cc, topics };
  }

  private async restorePlan(hardwareId: string, topics: ConfigTopics, previous: RetainedConfig | null): Promise<void> {
    const restoredVer = previous ? previous.ver : null;
    try {
      await this.publisher.publishRetained(topics.config, previous ? previous.json : "");
      this.logger?.warn({ hardware_id: hardwareId, restored_ver: restoredVer }, "config_plan_restored");
    } catch (error) {
      this.logger?.error({ err: error, hardware_id: hardwareId, restored_ver: restoredVer }, "config_plan_restore_failed");
    }
  }
}
