import PDFDocument from 'pdfkit';
import type { DerivedSalaryRecord } from '../types';

const fmt = (n: number) => `$${n.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

export function renderSalarySlipPdf(r: DerivedSalaryRecord, generatedAt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: 40, size: 'A4', info: { Title: `Salary slip ${r.employeeId}` } });
    const chunks: Buffer[] = [];
    doc.on('data', (c: Buffer) => chunks.push(c));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const margin = 40;
    const contentWidth = doc.page.width - margin * 2;

    doc.fontSize(18).font('Helvetica-Bold').fillColor('#0f172a').text('Salary Slip', { align: 'center' });
    doc.moveDown(0.5);
    doc.fontSize(9).font('Helvetica').fillColor('#64748b').text(`Generated: ${generatedAt}`, { align: 'center' });
    doc.moveDown();

    doc.fontSize(11).fillColor('#0f172a');
    doc.font('Helvetica-Bold').text('Employee ID: ', { continued: true }).font('Helvetica').text(String(r.employeeId));
    doc.font('Helvetica-Bold').text('Name: ', { continued: true }).font('Helvetica').text(r.name);
    doc.moveDown();

    const rows: Array<[string, string]> = [
      ['Basic Salary', fmt(r.basicSalary)],
      [`Bonus (${r.bonusPercentage.toFixed(2)}%)`, fmt(r.bonus)],
      [`Tax (${r.taxPercentage.toFixed(2)}%)`, `-${fmt(r.tax)}`],
    ];
    for (const [label, value] of rows) {
      const y = doc.y;
      doc.font('Helvetica').fontSize(10).text(label, margin, y);
      doc.text(value, margin, y, { width: contentWidth, align: 'right' });
      doc.moveDown(0.4);
    }

    const lineY = doc.y + 4;
    doc.moveTo(margin, lineY).lineTo(margin + contentWidth, lineY).lineWidth(0.5).strokeColor('#e6e9ee').stroke();
    doc.moveDown();

    const y = doc.y;
    doc.font('Helvetica-Bold').fontSize(12).fillColor('#065f46').text('Net Salary', margin, y);
    doc.text(fmt(r.netSalary), margin, y, { width: contentWidth, align: 'right' });

    doc.moveDown(2);
    doc.fontSize(9).font('Helvetica').fillColor('#94a3b8')
      .text('This is a system-generated salary slip and does not require a signature.', margin, doc.y, {
        align: 'center',
        width: contentWidth,
      });

    doc.end();
  });
}
