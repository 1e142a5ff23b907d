import { CatalogService, detectCatalogColumns } from '../services/catalog.service';

describe('detectCatalogColumns', () => {
  it('should find description and code columns by keyword', () => {
    expect(detectCatalogColumns(['Item No', 'Descripción Mercancía', 'Código Arancelario'])).toEqual({
      description: 'Descripción Mercancía',
      code: 'Código Arancelario',
    });
  });

  it('should prefer exact header matches', () => {
    expect(detectCatalogColumns(['Product name', 'Description', 'Code', 'HS code'])).toEqual({
      description: 'Description',
      code: 'Code',
    });
  });

  it('should return null when nothing matches', () => {
    expect(detectCatalogColumns(['Qty', 'Price'])).toEqual({ description: null, code: null });
  });
});

describe('CatalogService', () => {
  it('should skip pending and blank codes', () => {
    const catalog = new CatalogService({
      'Blusa para Dama': '6206.40.00.00.00',
      Calzado: 'PENDING',
      Bolso: '  ',
    });

    expect(catalog.size).toBe(1);
    expect(catalog.getAllEntries()).toEqual({ 'blusa para dama': '6206.40.00.00.00' });
  });

  it('should match exactly, then by contained description', () => {
    const catalog = new CatalogService({ 'blusa para dama': '6206.40.00.00.00' });

    expect(catalog.getCode('  BLUSA   para dama ')).toBe('6206.40.00.00.00');
    expect(catalog.getCode('Blusa para dama manga larga')).toBe('6206.40.00.00.00');
    expect(catalog.getCode('Zapato deportivo')).toBe('PENDING');
    expect(catalog.getCode(null)).toBe('PENDING');
  });

  it('should import spreadsheet rows', () => {
    const catalog = new CatalogService();

    const accepted = catalog.loadFromRows([
      { Descripción: 'Calzado para dama', Código: '6404.19.90.00.00' },
      { Descripción: '', Código: '1234.56' },
    ]);

    expect(accepted).toBe(1);
    expect(catalog.getCode('calzado para dama')).toBe('6404.19.90.00.00');
  });

  it('should import nothing without recognisable columns', () => {
    const catalog = new CatalogService();
    expect(catalog.loadFromRows([{ Qty: 1, Price: 2 }])).toBe(0);
    expect(catalog.loadFromRows([])).toBe(0);
  });

  it('should load the bundled catalogue file', () => {
    const catalog = CatalogService.fromFile();
    expect(catalog.getCode('Blusa para dama')).toBe('6206.40.00.00.00');
  });
});
