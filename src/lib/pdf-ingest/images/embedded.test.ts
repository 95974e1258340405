import { beforeEach, describe, expect, it, vi } from 'vitest';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { EmbeddedImageExtractor, cmykToRgb } from './embedded';

function solid(width: number, height: number) {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } } });
}

async function buildPdf(): Promise<Buffer> {
  const pdf = await PDFDocument.create();

  const jpg = await pdf.embedJpg(await solid(8, 6).jpeg().toBuffer());
  pdf.addPage([200, 200]).drawImage(jpg, { x: 10, y: 10, width: 80, height: 60 });

  const png = await pdf.embedPng(await solid(5, 4).png().toBuffer());
  pdf.addPage([200, 200]).drawImage(png, { x: 10, y: 10, width: 50, height: 40 });

  pdf.addPage([200, 200]).drawText('No images here');

  return Buffer.from(await pdf.save());
}

describe('EmbeddedImageExtractor', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('returns JPEG streams as stored and re-encodes raw pixels as PNG', async () => {
    const images = await new EmbeddedImageExtractor().extract(await buildPdf());

    expect(images).toHaveLength(2);

    const [jpeg, png] = images;
    expect(jpeg.page).toBe(1);
    expect(jpeg.fileName).toMatch(/^page1_img1_[0-9a-f]{6}\.jpg$/);
    expect(jpeg.mimeType).toBe('image/jpeg');
    expect(jpeg.data.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));

    expect(png.page).toBe(2);
    expect(png.fileName).toMatch(/^page2_img1_[0-9a-f]{6}\.png$/);
    expect(png.mimeType).toBe('image/png');
    const metadata = await sharp(png.data).metadata();
    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(5);
    expect(metadata.height).toBe(4);
  });

  it('rejects data that is not a PDF', async () => {
    await expect(new EmbeddedImageExtractor().extract(Buffer.from('plain text'))).rejects.toThrow();
  });
});

describe('cmykToRgb', () => {
  it('converts each four-byte pixel to three bytes', () => {
    const rgb = cmykToRgb(Uint8Array.from([0, 0, 0, 0, 255, 0, 0, 0, 0, 0, 0, 255]));

    expect([...rgb]).toEqual([255, 255, 255, 0, 255, 255, 0, 0, 0]);
  });
});
