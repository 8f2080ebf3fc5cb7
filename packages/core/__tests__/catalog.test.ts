import { describe, it, expect } from 'vitest';
import {
  TOOL_IDS,
  getToolCatalog,
  getToolEntry,
  hasCapability,
  capabilityMask,
  toToolDescriptor,
  isToolId,
} from '../src/tools/catalog.js';
import { validateToolArguments } from '../src/validation/tool-arguments.js';

describe('tool catalogue', () => {
  it('should load an entry for every tool id', () => {
    const catalog = getToolCatalog();
    expect(catalog.size).toBe(TOOL_IDS.length);
    expect(getToolCatalog()).toBe(catalog);
  });

  it('should recognise only known tool ids', () => {
    expect(isToolId('get_activities')).toBe(true);
    expect(isToolId('get_weather')).toBe(false);
  });

  it('should expose capability flags and masks', () => {
    const athlete = getToolEntry('get_athlete');
    expect(hasCapability(athlete, 'requires_oauth')).toBe(true);
    expect(hasCapability(athlete, 'admin_only')).toBe(false);
    // read_fitness (1) | requires_oauth (8)
    expect(capabilityMask(athlete)).toBe(9);
    expect(hasCapability(getToolEntry('admin_set_tool_override'), 'admin_only')).toBe(true);
  });

  it('should render descriptors with the parameter schema', () => {
    const descriptor = toToolDescriptor(getToolEntry('get_athlete'));
    expect(descriptor.name).toBe('get_athlete');
    expect(descriptor.description).toBe('Get the athlete profile from a connected provider');
    expect(descriptor.inputSchema).toMatchObject({ type: 'object', required: ['provider'] });
  });

  it('should validate calls against the declared schema', () => {
    const schema = getToolEntry('get_athlete').input_schema;
    expect(validateToolArguments({ provider: 'strava' }, schema)).toEqual({ valid: true });
    expect(validateToolArguments({}, schema)).toEqual({ valid: false, error: 'Missing required argument: provider' });
    expect(validateToolArguments({ provider: 'strava', units: 'km' }, schema)).toEqual({
      valid: false,
      error: 'Unknown argument: units',
    });
    expect(validateToolArguments({ provider: 'nike' }, schema).valid).toBe(false);
  });
});
