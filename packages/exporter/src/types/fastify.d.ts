import "fastify";
import type { Registry } from "prom-client";
import type { AnySubExporter } from "../exporters/index.js";

declare module "fastify" {
  interface FastifyInstance {
    registry: Registry;
    exporters: AnySubExporter[];
  }
}
