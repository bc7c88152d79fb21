import { FastifyInstance } from "fastify";
import { GOVERNANCE_EVENT_CATALOG } from "@gov-explorer/shared";
import { setLogContext } from "../log-context";
import { listBundleNames, listProjectNames } from "../view-rows";
import type { ExplorerRouteDeps } from "./bundle.routes";

/** Options for the history filters: event names, bundle names, project names. */
export async function registerCatalogRoutes(app: FastifyInstance, deps: ExplorerRouteDeps) {
  app.get("/api/v1/catalog", async () => {
    setLogContext({ view: "catalog" });
    const bundles = await deps.dataSource.listBundles(deps.limits.bundles);
    return {
      events: [...GOVERNANCE_EVENT_CATALOG],
      bundles: listBundleNames(bundles),
      projects: listProjectNames(bundles),
    };
  });
}
