import { describe, expect, it } from 'vitest';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { MupdfPageRenderer } from './page-renderer';

async function twoPagePdf(): Promise<Buffer> {
  const pdf = await PDFDocument.create();
  pdf.addPage([72, 72]).drawText('1', { x: 10, y: 10, size: 20 });
  pdf.addPage([72, 72]).drawText('2', { x: 10, y: 10, size: 20 });
  return Buffer.from(await pdf.save());
}

describe('MupdfPageRenderer', () => {
  it('renders one JPEG per page at the configured resolution', async () => {
    const images = await new MupdfPageRenderer({ dpi: 144 }).render(await twoPagePdf());

    expect(images.map((image) => image.page)).toEqual([1, 2]);
    expect(images[0].fileName).toMatch(/^page_1_[0-9a-f]{8}\.jpg$/);
    expect(images[1].fileName).toMatch(/^page_2_[0-9a-f]{8}\.jpg$/);

    for (const image of images) {
      expect(image.mimeType).toBe('image/jpeg');
      expect(image.data.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
      const metadata = await sharp(image.data).metadata();
      expect(metadata.width).toBe(144);
      expect(metadata.height).toBe(144);
    }
  });
});
