import "dotenv/config";
import http from "http";
import * as grpc from "@grpc/grpc-js";
import { globalRegistry } from "@taskline/sdk";
import { loadConfig } from "./config";
import { buildEngine } from "./engine";
import { loadExecutorModules } from "./executors/loader";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { TaskServiceImpl } from "./grpc/task.service";
import { HealthService } from "./grpc/health.service";
import { FileExperimentLogger } from "./experiments/file-experiment-logger";
import { QueueDepthSampler } from "./metrics/queue-depth-sampler";
import { startMetricsServer } from "./metrics/server";

const TAG = "[taskline]";

const config = loadConfig();
loadExecutorModules(config.executorModules, globalRegistry);
const engine = buildEngine(config, globalRegistry);
const sampler = new QueueDepthSampler(engine.queue, engine.metrics);

engine.connections?.pg.on("error", (err) => console.error(`${TAG} idle client error:`, err));

let grpcServer: grpc.Server | null = null;
let metricsServer: http.Server | null = null;

async function main() {
  console.log(`${TAG} starting engine... (backend: ${config.storeBackend}, workers: ${config.workers})`);

  // Health checks
  await engine.registry.ping();
  console.log(`${TAG} registry connected`);

  await engine.queue.ping();
  console.log(`${TAG} queue connected`);

  // gRPC
  grpcServer = createGrpcServer(
    new TaskServiceImpl(engine.gateway, engine.reporter),
    new HealthService([engine.registry, engine.queue]),
  );
  await startGrpcServer(grpcServer, config.port);

  metricsServer = await startMetricsServer(engine.metrics.registry, config.metricsPort);
  sampler.start();

  engine.pool.start();
  await engine.scheduler.start();

  console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  await engine.scheduler.stop();
  sampler.stop();
  // lets in-flight jobs settle before the stores go away
  await engine.pool.stop();
  engine.leaseKeeper.stopAll();
  engine.monitor.disable();
  if (engine.experiments instanceof FileExperimentLogger) await engine.experiments.flush();

  if (grpcServer) await stopGrpcServer(grpcServer);
  metricsServer?.close();

  if (engine.connections) {
    await engine.connections.pg.end();
    await engine.connections.redis.quit();
  }
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
