import { extractWithJsonPath, parsePath, resolvePath } from './json-path';

describe('parsePath', () => {
  it('should split dotted paths with indexes', () => {
    expect(parsePath('$.props.items[0].id')).toEqual(['props', 'items', 0, 'id']);
  });

  it('should handle consecutive indexes', () => {
    expect(parsePath('grid[1][2]')).toEqual(['grid', 1, 2]);
  });
});

describe('resolvePath', () => {
  const payload = { data: { items: [{ id: 'a' }, { id: 'b' }], total: 2 } };

  it('should resolve nested values', () => {
    expect(resolvePath(payload, 'data.items[1].id')).toBe('b');
  });

  it('should return arrays and objects unchanged', () => {
    expect(resolvePath(payload, 'data.items')).toBe(payload.data.items);
  });

  it('should return undefined for missing steps', () => {
    expect(resolvePath(payload, 'data.pages[0]')).toBeUndefined();
    expect(resolvePath(payload, 'data.total.value')).toBeUndefined();
  });
});

describe('extractWithJsonPath', () => {
  const payload = { name: 'Tent', price: 89.5, inStock: false, tags: ['camp'], note: '  ' };

  it('should return strings and numbers as-is', () => {
    expect(extractWithJsonPath(payload, 'name')).toBe('Tent');
    expect(extractWithJsonPath(payload, 'price')).toBe(89.5);
  });

  it('should stringify booleans', () => {
    expect(extractWithJsonPath(payload, 'inStock')).toBe('false');
  });

  it('should return null for containers and blanks', () => {
    expect(extractWithJsonPath(payload, 'tags')).toBeNull();
    expect(extractWithJsonPath(payload, 'note')).toBeNull();
    expect(extractWithJsonPath(payload, 'missing')).toBeNull();
  });
});
