const WIDTH = 33;

type LineFields = {
  erpLine?: string;
  reference?: string;
  locationCode?: string;
  label?: string;
  cartonQuantity?: string;
  cartonPrice?: string;
  packagingCount?: string;
  unit?: string;
  unitQuantity?: string;
  unitPrice?: string;
};

export function lineRow(fields: LineFields = {}): string[] {
  const row = Array.from({ length: WIDTH }, () => '');
  row[0] = 'LL';
  row[1] = fields.erpLine ?? '1';
  row[2] = fields.reference ?? 'REF001';
  row[4] = fields.locationCode ?? '3012345678901';
  row[5] = fields.label ?? '';
  row[6] = fields.cartonQuantity ?? '';
  row[7] = fields.cartonPrice ?? '';
  row[12] = fields.packagingCount ?? '';
  row[13] = fields.unit ?? '';
  row[14] = fields.unitQuantity ?? '';
  row[15] = fields.unitPrice ?? '';
  return row;
}

// Header rows use the line-item columns for their own data; it must survive every stage
export function headerRow(): string[] {
  const row = Array.from({ length: WIDTH }, (_, i) => `H${i}`);
  row[0] = 'HH';
  return row;
}
