import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import path from "path";
import { HealthService } from "./health.service";
import { TaskServiceImpl } from "./task.service";

const PROTO_DIR = path.join(__dirname, "../../../..", "packages/proto");
const HEALTH_PROTO_PATH = path.join(PROTO_DIR, "health.proto");
const TASKS_PROTO_PATH = path.join(PROTO_DIR, "tasks.proto");

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

function isServiceConstructor(node: unknown): node is grpc.ServiceClientConstructor {
  return typeof node === "function" && "service" in node;
}

// Walks a loaded package ("taskline.v1.TaskService") down to its service definition.
export function findService(root: grpc.GrpcObject, qualifiedName: string): grpc.ServiceDefinition {
  let node: unknown = root;
  for (const segment of qualifiedName.split(".")) {
    if ((typeof node !== "object" && typeof node !== "function") || node === null || !(segment in node)) {
      throw new Error(`Service ${qualifiedName} not found in proto definitions`);
    }
    node = Reflect.get(node, segment);
  }
  if (!isServiceConstructor(node)) {
    throw new Error(`${qualifiedName} is not a service`);
  }
  return node.service;
}

export function loadProtos(): grpc.GrpcObject {
  const packageDef = protoLoader.loadSync([TASKS_PROTO_PATH, HEALTH_PROTO_PATH], protoOptions);
  return grpc.loadPackageDefinition(packageDef);
}

export function createGrpcServer(taskService: TaskServiceImpl, healthService: HealthService): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 16 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const protos = loadProtos();

  server.addService(findService(protos, "grpc.health.v1.Health"), {
    check: healthService.check.bind(healthService),
    watch: healthService.watch.bind(healthService),
  });

  server.addService(findService(protos, "taskline.v1.TaskService"), {
    submitTask: taskService.submitTask.bind(taskService),
    getTaskStatus: taskService.getTaskStatus.bind(taskService),
  });

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[taskline] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown(() => resolve());
  });
}
