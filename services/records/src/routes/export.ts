import type { FastifyInstance, FastifyRequest } from 'fastify';
import { CONTENT_TYPES, exportFileName, writeExportFile } from '../export/exporter';
import type { ExportFormat } from '../types';
import type { RouteDeps } from './deps';

const FORMATS: readonly ExportFormat[] = ['csv', 'json'];

export async function registerExportRoutes(app: FastifyInstance, { service }: RouteDeps) {
  for (const format of FORMATS) {
    // Download the full, unfiltered set without touching local disk
    app.get(`/export/${format}`, async (_req, reply) => {
      const content = await service.exportAll(format);
      return reply
        .header('Content-Disposition', `attachment; filename=${exportFileName(format)}`)
        .type(CONTENT_TYPES[format])
        .send(content);
    });
  }
}

/**
 * Side effect of an unfiltered listing: writes timestamped export files
 * for each enabled format. Failures are logged, never surfaced.
 */
export async function autoExport(req: FastifyRequest, { service, config }: RouteDeps): Promise<void> {
  const enabled = FORMATS.filter((format) => config.export[format]);
  if (enabled.length === 0) return;

  const date = new Date();
  for (const format of enabled) {
    try {
      const content = await service.exportAll(format);
      const path = await writeExportFile(config.export.dir, format, content, date);
      req.log.info({ path }, `${format.toUpperCase()} export written`);
    } catch (err) {
      req.log.error({ err }, `${format.toUpperCase()} export failed`);
    }
  }
}
