import { encodeQuery, type QueryParams } from "./session.js";
import type { DashboardConfig } from "../dashboards.js";
import type { Timepoint } from "../timepoints.js";

export type DashboardRef = {
  uid: string;
  /** Path returned by the search API, e.g. `/d/<uid>/<slug>`. */
  url: string;
};

export function dashboardSlug(ref: DashboardRef) {
  const segments = ref.url.split("/").filter(Boolean);
  return segments[segments.length - 1] ?? ref.uid;
}

export function chartFileName(dashboardName: string, panelId: number, timepointId: number) {
  return `${dashboardName}__${panelId}__${timepointId}.png`;
}

function variableParams(config: DashboardConfig): QueryParams {
  const params: QueryParams = {};
  for (const [key, value] of Object.entries(config.vars ?? {})) {
    params[`var-${key}`] = typeof value === "number" ? String(value) : value;
  }
  return params;
}

function rangeParams(timepoint: Timepoint) {
  return { from: timepoint.start * 1000, to: timepoint.end * 1000 };
}

function withQuery(base: string, params: QueryParams) {
  const query = encodeQuery(params);
  return query ? `${base}?${query}` : base;
}

/** Whole dashboard for one time window. */
export function buildFullLink(config: DashboardConfig, ref: DashboardRef, timepoint: Timepoint) {
  return withQuery(`${config.host}/d/${ref.uid}/${dashboardSlug(ref)}`, {
    orgId: config.orgId,
    ...rangeParams(timepoint),
    ...variableParams(config)
  });
}

function panelParams(
  config: DashboardConfig,
  panelId: number,
  timepoint: Timepoint,
  view: boolean
): QueryParams {
  return {
    orgId: config.orgId,
    panelId,
    viewPanel: view ? panelId : undefined,
    ...rangeParams(timepoint),
    theme: config.whiteTheme ? "light" : "dark",
    tz: config.tz,
    ...variableParams(config)
  };
}

/** Single panel in view mode. */
export function buildPanelViewUrl(
  config: DashboardConfig,
  ref: DashboardRef,
  panelId: number,
  timepoint: Timepoint
) {
  return withQuery(
    `${config.host}/d/${ref.uid}/${dashboardSlug(ref)}`,
    panelParams(config, panelId, timepoint, true)
  );
}

export function toFullscreenUrl(viewUrl: string) {
  return `${viewUrl}&fullscreen`;
}

/** Server-side render endpoint for one panel. */
export function buildRenderUrl(
  config: DashboardConfig,
  ref: DashboardRef,
  panelId: number,
  timepoint: Timepoint
) {
  return withQuery(`${config.host}/render/d-solo/${ref.uid}/${dashboardSlug(ref)}`, {
    ...panelParams(config, panelId, timepoint, false),
    width: config.width,
    height: config.height,
    timeout: config.timeout
  });
}
