import { describe, it, expect } from 'vitest';
import { createMapDef, edgeContact, isInBounds } from './mapDef';

describe('edgeContact', () => {
  const map = createMapDef(4, 3);

  it('reports each edge a coordinate sits on', () => {
    expect(edgeContact(map, [{ x: 0, y: 0 }])).toEqual({ left: true, right: false, top: false, bottom: true });
    expect(edgeContact(map, [{ x: 3, y: 2 }])).toEqual({ left: false, right: true, top: true, bottom: false });
  });

  it('keeps an edge once any coordinate has touched it', () => {
    const contact = edgeContact(map, [{ x: 0, y: 1 }, { x: 1, y: 1 }, { x: 3, y: 1 }]);
    expect(contact).toEqual({ left: true, right: true, top: false, bottom: false });
  });

  it('touches nothing from the interior', () => {
    expect(edgeContact(map, [{ x: 1, y: 1 }, { x: 2, y: 1 }])).toEqual({
      left: false,
      right: false,
      top: false,
      bottom: false,
    });
  });
});

describe('isInBounds', () => {
  it('stops at width and height', () => {
    const map = createMapDef(4, 3);
    expect(isInBounds(map, { x: 3, y: 2 })).toBe(true);
    expect(isInBounds(map, { x: 4, y: 2 })).toBe(false);
    expect(isInBounds(map, { x: 0, y: -1 })).toBe(false);
  });
});
