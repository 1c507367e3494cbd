import { promises as fs } from 'fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { adapter } from '../../../sites/climatico/adapter';
import { ConfigurationError, IoError } from '../../errors/index';
import { PageStore } from '../../storage/page-store';
import { extractDocument, ProductExtractor } from '../product-extractor';

const fixture = new URL('./fixtures/listing-page.html', import.meta.url);

const item = (rows: string) => `
  <div id="amasty-shopby-product-list">
    <div class="products wrapper list products-list">
      <ol class="products list items product-items">
        <li><table class="prod-list-features"><tbody>${rows}</tbody></table></li>
      </ol>
    </div>
  </div>`;

describe('extractDocument', () => {
  test('finds every product item in document order', async () => {
    const html = await fs.readFile(fixture, 'utf8');
    const records = extractDocument(html, adapter);

    expect(records.map((r) => r.productCode)).toEqual(['ABC-123', '', 'XYZ-9']);
  });

  test('maps image, link and feature rows onto the record', async () => {
    const html = await fs.readFile(fixture, 'utf8');
    const [first] = extractDocument(html, adapter);

    expect(first).toEqual({
      name: 'Aer conditionat Test Unit 12000 BTU',
      manufacturer: '',
      productCode: 'ABC-123',
      productUrl: 'https://www.climatico.ro/test-unit-12000.html',
      resellerProductPageUrl: '',
      manufacturerProductPageUrl: '',
      listingImagePath: '',
      listingImageUrl: 'https://img.test/unit-12000.jpg',
      price: 0,
      currency: 'RON',
      hasWifiConnection: true,
      mainsVoltage: '220 V',
      internalUnitLength: '798 mm',
      heatingNoiseLevel: '23 dB',
      coolingNoiseLevel: '21 dB',
      heatingEnergyClass: 'A+',
      coolingEnergyClass: 'A++',
      heatingBtuCapacity: '13000 BTU',
      coolingBtuCapacity: '12000 BTU',
      categoryDrillDown: [],
    });
  });

  test('leaves feature fields empty when an item has no feature table', async () => {
    const html = await fs.readFile(fixture, 'utf8');
    const second = extractDocument(html, adapter)[1];

    expect(second.name).toBe('');
    expect(second.listingImageUrl).toBe('');
    expect(second.productUrl).toBe('https://www.climatico.ro/fara-tabel.html');
    expect(second.productCode).toBe('');
    expect(second.coolingBtuCapacity).toBe('');
    expect(second.heatingBtuCapacity).toBe('');
    expect(second.mainsVoltage).toBe('');
    expect(second.internalUnitLength).toBe('');
    expect(second.hasWifiConnection).toBe(false);
  });

  test('ignores unknown labels and reads a single-cell row as an empty value', async () => {
    const html = await fs.readFile(fixture, 'utf8');
    const third = extractDocument(html, adapter)[2];

    expect(third.productCode).toBe('XYZ-9');
    expect(third.coolingBtuCapacity).toBe('');
    expect(third.productUrl).toBe('');
    expect(third.hasWifiConnection).toBe(false);
  });

  test('yields no records for a page without product items', () => {
    expect(extractDocument('<html><body><ol><li>x</li></ol></body></html>', adapter)).toEqual([]);
    expect(extractDocument('', adapter)).toEqual([]);
  });

  test('reads the product code cell verbatim', () => {
    const [record] = extractDocument(item('<tr><td>Cod produs:</td><td>ABC-123</td></tr>'), adapter);
    expect(record.productCode).toBe('ABC-123');
  });

  describe('WiFi flag', () => {
    const wifi = (value: string) =>
      extractDocument(item(`<tr><td>Conexiune Wi-Fi:</td><td>${value}</td></tr>`), adapter)[0]
        .hasWifiConnection;

    test('is true for values starting with the affirmative token', () => {
      expect(wifi('Da')).toBe(true);
      expect(wifi('Da, integrat')).toBe(true);
    });

    test('is false for anything else', () => {
      expect(wifi('Nu')).toBe(false);
      expect(wifi('')).toBe(false);
      expect(wifi('Optional')).toBe(false);
      expect(wifi('da')).toBe(false);
    });
  });
});

describe('ProductExtractor', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'extractor-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  test('extracts records from every stored capture', async () => {
    const sources = path.join(root, 'sources');
    await fs.mkdir(sources);
    await fs.copyFile(fixture, path.join(sources, 'a.html'));
    await fs.writeFile(path.join(sources, 'b.html'), item('<tr><td>Cod produs:</td><td>B-1</td></tr>'));
    await fs.writeFile(path.join(sources, 'notes.txt'), 'not a capture');

    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: sources,
      productsDir: path.join(root, 'products'),
    });
    const result = await extractor.extract();

    expect(result.records.map((r) => r.productCode)).toEqual(['ABC-123', '', 'XYZ-9', 'B-1']);
    expect(result.skippedFiles).toEqual([]);
  });

  test('returns no records for an empty sources directory', async () => {
    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: root,
      productsDir: path.join(root, 'products'),
    });

    await expect(extractor.extract()).resolves.toEqual({ records: [], skippedFiles: [] });
  });

  test('rejects a sources path that is not a directory', async () => {
    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: path.join(root, 'missing'),
      productsDir: path.join(root, 'products'),
    });

    const error = await extractor.extract().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(IoError);
    expect(error).toMatchObject({ code: 'not-a-directory' });
  });

  test('rejects identical sources and products directories', async () => {
    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: root,
      productsDir: path.join(root, '.'),
    });

    await expect(extractor.extract()).rejects.toBeInstanceOf(ConfigurationError);
  });

  test('ignores directories named like captures', async () => {
    await fs.mkdir(path.join(root, 'broken.html'));
    await fs.writeFile(path.join(root, 'ok.html'), item('<tr><td>Cod produs:</td><td>OK-1</td></tr>'));

    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: root,
      productsDir: path.join(root, 'products'),
    });
    const result = await extractor.extract();

    expect(result.records.map((r) => r.productCode)).toEqual(['OK-1']);
    expect(result.skippedFiles).toEqual([]);
  });

  test('skips a capture that cannot be read and keeps extracting the rest', async () => {
    await fs.writeFile(path.join(root, 'a.html'), item('<tr><td>Cod produs:</td><td>A-1</td></tr>'));
    await fs.writeFile(path.join(root, 'b.html'), item('<tr><td>Cod produs:</td><td>B-1</td></tr>'));
    await fs.writeFile(path.join(root, 'c.html'), item('<tr><td>Cod produs:</td><td>C-1</td></tr>'));
    const unreadable = path.join(root, 'b.html');

    class FlakyStore extends PageStore {
      override async read(file: string): Promise<Buffer> {
        if (file === unreadable) {
          throw new IoError(`Failed to read capture ${file}`, 'read-failed', file);
        }
        return super.read(file);
      }
    }

    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: root,
      productsDir: path.join(root, 'products'),
      store: new FlakyStore(root),
    });
    const result = await extractor.extract();

    expect(result.records.map((r) => r.productCode)).toEqual(['A-1', 'C-1']);
    expect(result.skippedFiles).toEqual([unreadable]);
  });
});
