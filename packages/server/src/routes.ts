/**
 * HTTP routes. Each request gets a fresh controller; bodies, params and
 * queries are parsed with the zod schemas in models/requests.ts, so a bad
 * request reaches the error handler as a ZodError.
 */

import type { Controller } from "@tsoa/runtime";
import { Router, type Request, type RequestHandler } from "express";
import {
  addCarRequestSchema,
  addVertexRequestSchema,
  carParamsSchema,
  connectRequestSchema,
  edgeParamsSchema,
  eventsQuerySchema,
  tickRequestSchema,
  updateEdgeRequestSchema,
  vertexParamsSchema,
} from "./models/requests.js";
import type { SimulationService } from "./services/simulation.service.js";
import { CarController } from "./controllers/car.controller.js";
import { EventController } from "./controllers/event.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { TickController } from "./controllers/tick.controller.js";
import { TownController } from "./controllers/town.controller.js";

type Action<C extends Controller> = (controller: C, req: Request) => Promise<unknown>;

/** Run a controller action and send its result (204 when it returns nothing) */
export function handle<C extends Controller>(create: () => C, action: Action<C>): RequestHandler {
  return (req, res, next) => {
    const controller = create();
    void Promise.resolve()
      .then(() => action(controller, req))
      .then((result) => {
        if (result === undefined) {
          res.status(controller.getStatus() ?? 204).end();
        } else {
          res.status(controller.getStatus() ?? 200).json(result);
        }
      })
      .catch(next);
  };
}

export function registerRoutes(router: Router, service: SimulationService): Router {
  const health = () => new HealthController(service);
  const town = () => new TownController(service);
  const cars = () => new CarController(service);
  const ticks = () => new TickController(service);
  const events = () => new EventController(service);

  router.get("/health", handle(health, (c) => c.getHealth()));

  router.get("/api/towns", handle(town, (c) => c.listTownConfigs()));
  router.get("/api/town", handle(town, (c) => c.getTown()));
  router.get("/api/town/vertices", handle(town, (c) => c.listVertices()));
  router.post("/api/town/vertices", handle(town, (c, req) => c.addVertex(addVertexRequestSchema.parse(req.body))));
  router.delete(
    "/api/town/vertices/:name",
    handle(town, (c, req) => c.removeVertex(vertexParamsSchema.parse(req.params).name)),
  );
  router.get("/api/town/edges", handle(town, (c) => c.listEdges()));
  router.post("/api/town/edges", handle(town, (c, req) => c.connect(connectRequestSchema.parse(req.body))));
  router.put(
    "/api/town/edges/:from/:to",
    handle(town, (c, req) => {
      const { from, to } = edgeParamsSchema.parse(req.params);
      return c.updateEdge(from, to, updateEdgeRequestSchema.parse(req.body));
    }),
  );
  router.delete(
    "/api/town/edges/:from/:to",
    handle(town, (c, req) => {
      const { from, to } = edgeParamsSchema.parse(req.params);
      return c.disconnect(from, to);
    }),
  );

  router.get("/api/cars", handle(cars, (c) => c.listCars()));
  router.post("/api/cars", handle(cars, (c, req) => c.addCar(addCarRequestSchema.parse(req.body))));
  router.get("/api/cars/:id", handle(cars, (c, req) => c.getCar(carParamsSchema.parse(req.params).id)));
  router.delete("/api/cars/:id", handle(cars, (c, req) => c.removeCar(carParamsSchema.parse(req.params).id)));
  router.post(
    "/api/cars/:id/depart",
    handle(cars, (c, req) => c.departCar(carParamsSchema.parse(req.params).id)),
  );
  router.post(
    "/api/cars/:id/advance",
    handle(cars, (c, req) => c.advanceCar(carParamsSchema.parse(req.params).id)),
  );
  router.post(
    "/api/cars/:id/reroute",
    handle(cars, (c, req) => c.rerouteCar(carParamsSchema.parse(req.params).id)),
  );

  router.post("/api/ticks", handle(ticks, (c, req) => c.applyTick(tickRequestSchema.parse(req.body))));
  router.get("/api/events", handle(events, (c, req) => c.listEvents(eventsQuerySchema.parse(req.query).limit)));

  return router;
}

export function createRouter(service: SimulationService): Router {
  return registerRoutes(Router(), service);
}
