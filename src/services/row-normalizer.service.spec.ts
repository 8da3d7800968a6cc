import { ABSENT, present } from '../inventory/inventory.types';
import { ColumnSchemaService } from './column-schema.service';
import { RowNormalizerService, parseDecimal } from './row-normalizer.service';

describe('parseDecimal', () => {
  it.each([
    ['1000', 1000],
    ['1000.50', 1000.5],
    ['1,000', 1000],
    ['1,000.50', 1000.5],
    ['-500', -500],
    [' 42 ', 42],
    ['.5', 0.5],
  ])('parses %p', (raw, expected) => {
    expect(parseDecimal(raw)).toBe(expected);
  });

  it.each(['abc', '$1000', '1.2.3', '12a', '', '-', '1,000,', '€5'])('rejects %p', (raw) => {
    expect(parseDecimal(raw)).toBeNull();
  });
});

describe('RowNormalizerService', () => {
  const normalizer = new RowNormalizerService();
  const schema = new ColumnSchemaService();
  const fullColumns = schema.resolveColumns([
    'SKU',
    'Name',
    'Selling Price',
    'Barcode',
    'Description',
    'Category',
    'Location',
    'Supplier',
    'Stock',
    'Min Stock',
    'Cost Price',
    'Unit',
  ]);
  const minimalColumns = schema.resolveColumns(['SKU', 'Name', 'Selling Price']);

  it('skips rows whose cells are all blank', () => {
    expect(normalizer.normalize(['', '  ', ''], minimalColumns, 4)).toEqual({ kind: 'blank' });
  });

  it('builds a typed row from trimmed cells', () => {
    const outcome = normalizer.normalize(
      [' A-1 ', ' Widget ', '1,250.75', '', 'Blue', 'General', 'Main Store', '', '-3', '2', '900', ''],
      fullColumns,
      1,
    );

    expect(outcome).toEqual({
      kind: 'row',
      row: {
        rowNumber: 1,
        sku: 'A-1',
        name: 'Widget',
        sellingPrice: 1250.75,
        barcode: present(null),
        description: present('Blue'),
        categoryName: present('General'),
        locationName: present('Main Store'),
        supplierName: present(null),
        stock: present(-3),
        minStock: present(2),
        costPrice: present(900),
        unit: present('pcs'),
      },
    });
  });

  it('marks columns missing from the header as absent', () => {
    const outcome = normalizer.normalize(['A-1', 'Widget', '10'], minimalColumns, 1);

    expect(outcome).toEqual({
      kind: 'row',
      row: expect.objectContaining({
        barcode: ABSENT,
        locationName: ABSENT,
        stock: ABSENT,
        unit: ABSENT,
      }),
    });
  });

  it('reports the first missing required field', () => {
    expect(normalizer.normalize(['', '', '', 'x'], fullColumns, 2)).toEqual({
      kind: 'error',
      error: { row: 2, column: 'SKU', message: 'Missing or empty SKU' },
    });
    expect(normalizer.normalize(['A-1', ' ', ''], minimalColumns, 3)).toEqual({
      kind: 'error',
      error: { row: 3, column: 'Name', message: 'Missing or empty Name' },
    });
    expect(normalizer.normalize(['A-1', 'Widget'], minimalColumns, 4)).toEqual({
      kind: 'error',
      error: { row: 4, column: 'Selling Price', message: 'Missing or empty Selling Price' },
    });
  });

  it.each(['abc', '$1000', '0', '-100'])('rejects selling price %p', (raw) => {
    expect(normalizer.normalize(['A-1', 'Widget', raw], minimalColumns, 5)).toEqual({
      kind: 'error',
      error: { row: 5, column: 'Selling Price', message: `Invalid Selling Price '${raw}'` },
    });
  });

  it('rejects unparseable optional numbers with a field-specific message', () => {
    const cells = ['A-1', 'Widget', '10', '', '', '', '', '', 'ten', '', '', ''];

    expect(normalizer.normalize(cells, fullColumns, 6)).toEqual({
      kind: 'error',
      error: { row: 6, column: 'Stock', message: "Invalid Stock 'ten'" },
    });
  });

  it('allows negative stock levels but not a negative cost price', () => {
    const negativeMin = ['A-1', 'Widget', '10', '', '', '', '', '', '', '-500', '', ''];
    const negativeCost = ['A-1', 'Widget', '10', '', '', '', '', '', '', '', '-5', ''];

    expect(normalizer.normalize(negativeMin, fullColumns, 1)).toMatchObject({
      kind: 'row',
      row: { minStock: present(-500) },
    });
    expect(normalizer.normalize(negativeCost, fullColumns, 2)).toEqual({
      kind: 'error',
      error: { row: 2, column: 'Cost Price', message: "Invalid Cost Price '-5'" },
    });
  });
});
