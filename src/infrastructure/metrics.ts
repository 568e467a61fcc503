/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "node:os";
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { RoomRegistry } from "@src/domains/room/roomRegistry.js";
import type { EngineHost } from "./engine.host.js";

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

/**
 * Application-specific metrics
 */
export const metrics = {
  // Socket Connections
  socketConnections: new Gauge({
    name: "signaling_socket_connections_total",
    help: "Current number of active socket connections",
    registers: [metricsRegistry],
  }),

  // Room coordinators
  roomsActive: new Gauge({
    name: "signaling_rooms_active",
    help: "Number of rooms with a running coordinator",
    registers: [metricsRegistry],
  }),

  roomStartFailures: new Counter({
    name: "signaling_room_start_failures_total",
    help: "Room coordinators that failed to start their engine",
    registers: [metricsRegistry],
  }),

  peersConnected: new Gauge({
    name: "signaling_peers_connected",
    help: "Peers currently registered with a room coordinator",
    registers: [metricsRegistry],
  }),

  // Relay traffic
  eventsRelayed: new Counter({
    name: "signaling_events_relayed_total",
    help: "Media events relayed between peers and engines",
    labelNames: ["direction"] as const, // inbound (peer → engine), outbound (engine → peer)
    registers: [metricsRegistry],
  }),

  eventsDropped: new Counter({
    name: "signaling_events_dropped_total",
    help: "Events dropped because their peer is unknown or gone",
    labelNames: ["reason"] as const, // stale_peer, unknown_target, no_session
    registers: [metricsRegistry],
  }),

  // Socket event processing
  eventsTotal: new Counter({
    name: "signaling_socket_events_total",
    help: "Total number of socket events processed",
    labelNames: ["event", "status"] as const,
    registers: [metricsRegistry],
  }),

  eventLatency: new Histogram({
    name: "signaling_socket_event_latency_seconds",
    help: "Socket event processing latency in seconds",
    labelNames: ["event"] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
    registers: [metricsRegistry],
  }),

  enginesActive: new Gauge({
    name: "signaling_engines_active",
    help: "Number of running relay engines",
    registers: [metricsRegistry],
  }),
};

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (
  roomRegistry: RoomRegistry,
  engineHost: EngineHost,
): FastifyPluginAsync => {
  return async (fastify) => {
    // Prometheus format endpoint
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      metrics.enginesActive.set(engineHost.getEngineCount());

      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    // JSON format endpoint
    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();
      const roomStats = roomRegistry.getStats();

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
            external: memoryUsage.external,
          },
          cpu: process.cpuUsage(),
          loadAverage: os.loadavg(),
        },
        application: {
          rooms: roomStats.length,
          peers: roomStats.reduce((sum, room) => sum + room.peerCount, 0),
          engines: engineHost.getEngineCount(),
          engineCapacity: engineHost.getCapacity(),
          roomStats,
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};
