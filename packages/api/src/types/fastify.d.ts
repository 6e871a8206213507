import "fastify";
import type { ScrapeSupervisor } from "../supervisor/scrape-supervisor.js";
import type { MemoryReceiver } from "../forwarding/memory-receiver.js";

declare module "fastify" {
  interface FastifyInstance {
    supervisor: ScrapeSupervisor;
    sampleBuffer: MemoryReceiver;
  }
}
