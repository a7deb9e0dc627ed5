import { chartFileName } from "../grafana/links.js";
import type { Timepoint } from "../timepoints.js";
import type { DashboardDataset } from "../types.js";

export const GRAPHS_PLACEHOLDER = "%%%graphs%%%";

const escapes: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;"
};

export function escapeHtml(value: string) {
  return value.replace(/[&<>"']/g, (char) => escapes[char] ?? char);
}

function timeRange(timepoint: Timepoint) {
  return `${timepoint.startHuman} - ${timepoint.endHuman}`;
}

/** Label of a timepoint among several: its tag, or its 1-based position. */
function periodLabel(timepoint: Timepoint) {
  return timepoint.tag ? escapeHtml(timepoint.tag) : `Test ${timepoint.id + 1}`;
}

function anchor(href: string | null | undefined, text: string) {
  return href ? `<a href="${escapeHtml(href)}">${text}</a>` : text;
}

function expandMacro(title: string, body: string[], indent = "") {
  return [
    `${indent}<ac:structured-macro ac:name="expand">`,
    `${indent}  <ac:parameter ac:name="title">${title}</ac:parameter>`,
    `${indent}  <ac:rich-text-body>`,
    ...body,
    `${indent}  </ac:rich-text-body>`,
    `${indent}</ac:structured-macro>`
  ];
}

function renderDashboard(dataset: DashboardDataset, graphWidth: number) {
  const title = escapeHtml(dataset.name);
  const several = dataset.timepoints.length > 1;
  const lines = [`<h2>${title}</h2>`];

  for (const timepoint of dataset.timepoints) {
    const period = several
      ? ` ${periodLabel(timepoint)} `
      : timepoint.tag
        ? ` ${escapeHtml(timepoint.tag)} `
        : " ";
    const text = `${title}${period}${timeRange(timepoint)}`;
    lines.push(`<p>${anchor(dataset.fullLinks[timepoint.id], text)}</p>`);
  }

  const panelBlocks = dataset.panels.flatMap((panel) => {
    const panelTitle = escapeHtml(panel.title);
    const body = dataset.timepoints.flatMap((timepoint) => {
      const text = several ? `${periodLabel(timepoint)} ${timeRange(timepoint)}` : panelTitle;
      const image = chartFileName(dataset.name, panel.id, timepoint.id);
      return [
        `    <p>${anchor(panel.links[timepoint.id], text)}</p>`,
        `    <p><ac:image ac:width="${graphWidth}"><ri:attachment ri:filename="${escapeHtml(image)}" /></ac:image></p>`
      ];
    });
    return [`<h3>${panelTitle}</h3>`, ...expandMacro(panelTitle, body)];
  });

  lines.push(...expandMacro(title, panelBlocks));
  return lines;
}

/** Storage-format markup for all dashboards, in the given order. */
export function renderReport(datasets: readonly DashboardDataset[], graphWidth: number) {
  return datasets.flatMap((dataset) => renderDashboard(dataset, graphWidth)).join("\n") + "\n";
}

/** Replaces the placeholder when the page has one, otherwise the whole body. */
export function composePageBody(currentBody: string, report: string) {
  if (!currentBody.includes(GRAPHS_PLACEHOLDER)) {
    return report;
  }
  return currentBody.split(GRAPHS_PLACEHOLDER).join(report);
}
