import type { RetainedPublisher } from "../../src/services/mqtt-publisher";
import { ServiceError } from "../../src/services/service-error";

export type PublishedMessage = {
  topic: string;
  payload: string;
};

/**
 * Retained publisher that keeps every message in order and the broker's
 * retained state per topic. Topics in `failTopics` reject; `brokerDown`
 * makes `connect` reject.
 */
export class RecordingPublisher implements RetainedPublisher {
  readonly messages: PublishedMessage[] = [];
  readonly retained = new Map<string, string>();
  readonly failTopics = new Set<string>();
  brokerDown = false;
  connects = 0;
  closed = false;

  async connect(): Promise<void> {
    if (this.brokerDown) {
      throw new ServiceError("publish_failed", "broker_unavailable", "Message broker is unavailable.");
    }
    this.connects += 1;
  }

  async publishRetained(topic: string, payload: string): Promise<void> {
    if (this.brokerDown || this.failTopics.has(topic)) {
      throw new ServiceError("publish_failed", "publish_failed", `Publishing to ${topic} failed.`, { topic });
    }
    this.messages.push({ topic, payload });
    if (payload === "") {
      this.retained.delete(topic);
    } else {
      this.retained.set(topic, payload);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
