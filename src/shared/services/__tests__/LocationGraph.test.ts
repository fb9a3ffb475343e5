import { buildDistanceIndex } from '../DistanceIndexBuilder';
import { LocationGraph, UnknownLocationError } from '../LocationGraph';
import { LocationCategory } from '../../types/LocationTypes';

describe('LocationGraph', () => {
  const graph = new LocationGraph(
    buildDistanceIndex([
      { name: 'Alpha', type: LocationCategory.Planet, x: 0, y: 0, z: 0 },
      { name: 'Beta', type: LocationCategory.Moon, parent: 'Alpha', x: 6, y: 8, z: 0 },
      { name: 'Gamma', type: LocationCategory.Station, x: 0, y: 0, z: 20 },
    ]),
  );

  it('should look up distances in both directions', () => {
    expect(graph.distance('Alpha', 'Beta')).toBe(10);
    expect(graph.distance('Beta', 'Alpha')).toBe(10);
    expect(graph.distance('Alpha', 'Gamma')).toBe(20);
  });

  it('should return 0 for the same name, known or not', () => {
    expect(graph.distance('Gamma', 'Gamma')).toBe(0);
    expect(graph.distance('Nowhere', 'Nowhere')).toBe(0);
  });

  it('should throw UnknownLocationError for unknown names', () => {
    expect(() => graph.distance('Alpha', 'Nowhere')).toThrow(UnknownLocationError);
    expect(() => graph.distance('Nowhere', 'Alpha')).toThrow('Location not found in distance index: Nowhere');
  });

  it('should report membership and names in index order', () => {
    expect(graph.has('Beta')).toBe(true);
    expect(graph.has('beta')).toBe(false);
    expect(graph.locationNames()).toEqual(['Alpha', 'Beta', 'Gamma']);
    expect(graph.size).toBe(3);
  });

  it('should list unknown names once each in first-seen order', () => {
    expect(graph.findUnknown(['Zeta', 'Alpha', 'Eta', 'Zeta', 'Beta'])).toEqual(['Zeta', 'Eta']);
    expect(graph.findUnknown(['Alpha'])).toEqual([]);
  });

  it('should hand out copies of the name list', () => {
    const names = graph.locationNames();
    names.push('Delta');

    expect(graph.locationNames()).toEqual(['Alpha', 'Beta', 'Gamma']);
  });
});
