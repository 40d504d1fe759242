import { promises as fs } from 'fs';
import path from 'path';
import { describeError } from '../errors';
import { renderSalarySlipPdf } from '../templates/payslipPdf';
import type { DerivedSalaryRecord } from '../types';
import { ensureDirectory, salarySlipFileName, type ExportOptions } from './csvExport';
import { formatGeneratedAt } from './timestamp';

export async function generateSalarySlipPdfs(
  records: readonly DerivedSalaryRecord[],
  outputDir: string,
  { logger, now = () => new Date() }: ExportOptions,
): Promise<string[] | null> {
  const written: string[] = [];
  try {
    await ensureDirectory(outputDir, logger);
    for (const r of records) {
      const file = path.join(outputDir, salarySlipFileName(r.employeeId, 'pdf'));
      await fs.writeFile(file, await renderSalarySlipPdf(r, formatGeneratedAt(now())));
      written.push(file);
      logger.debug({ file }, 'Generated PDF salary slip');
    }
  } catch (err) {
    logger.error({ written: written.length }, `Error generating PDF salary slips: ${describeError(err)}`);
    return null;
  }
  logger.info({ outputDir, count: written.length }, 'PDF salary slips generated');
  return written;
}
