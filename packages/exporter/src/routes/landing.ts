import type { FastifyPluginAsync } from "fastify";

/** Escape text for use inside an HTML attribute or element */
function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function landingPage(metricsPath: string): string {
  const path = escapeHtml(metricsPath);
  return [
    "<html>",
    "<head><title>Organization Stats Exporter</title></head>",
    "<body>",
    "<h1>Organization Stats Exporter</h1>",
    `<p><a href="${path}">Metrics</a></p>`,
    "</body>",
    "</html>",
  ].join("\n");
}

export const landingRoutes: FastifyPluginAsync = async (app) => {
  const page = landingPage(app.exporterConfig.metricsPath);

  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(page);
  });
};
