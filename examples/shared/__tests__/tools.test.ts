// examples/shared/__tests__/tools.test.ts

import {
  createActivitiesTool,
  createCheckFridgeTool,
  createCurrentDateTool,
  createFindRecipesTool,
  createWeatherTool,
  formatDate,
} from '../tools';

describe('sample tools', () => {
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('formatDate should pad month and day', () => {
    expect(formatDate(new Date(2025, 5, 7))).toBe('2025-06-07');
  });

  it('get_weather should be sunny only for low random draws', async () => {
    await expect(createWeatherTool(() => 0.01).execute({ city: 'Seattle' })).resolves.toEqual({
      success: true,
      data: { city: 'Seattle', temperature: 72, description: 'Sunny' },
    });
    await expect(createWeatherTool(() => 0.5).execute({ city: 'Seattle' })).resolves.toEqual({
      success: true,
      data: { city: 'Seattle', temperature: 60, description: 'Rainy' },
    });
    expect(infoSpy).toHaveBeenCalledWith('[Tools] Getting weather for Seattle');
  });

  it('get_weather should require a city', async () => {
    const definition = await createWeatherTool().getDefinition();
    expect(definition.parameters).toEqual([
      { name: 'city', type: 'string', description: 'The city to get the weather for.', required: true },
    ]);
  });

  it('get_activities should list activities in the city', async () => {
    const result = await createActivitiesTool().execute({ city: 'Seattle', date: '2025-06-07' });
    expect(result.data).toEqual([
      { name: 'Hiking', location: 'Seattle' },
      { name: 'Beach', location: 'Seattle' },
      { name: 'Museum', location: 'Seattle' },
    ]);
  });

  it('get_current_date should format the injected clock', async () => {
    const result = await createCurrentDateTool(() => new Date(2025, 11, 24)).execute({});
    expect(result.data).toBe('2025-12-24');
  });

  describe('find_recipes', () => {
    it.each([
      ['Pasta for the kids', 'Pasta Primavera'],
      ['something with TOFU', 'Tofu Stir Fry'],
      ['anything quick', 'Grilled Cheese Sandwich'],
    ])('should match "%s" to %s', async (query, title) => {
      const result = await createFindRecipesTool().execute({ query });
      expect(Array.isArray(result.data) && result.data.map((recipe: { title: string }) => recipe.title)).toEqual([title]);
    });
  });

  it('check_fridge should hold pasta or tofu ingredients', async () => {
    await expect(createCheckFridgeTool(() => 0.2).execute({})).resolves.toEqual({
      success: true,
      data: ['pasta', 'tomato sauce', 'bell peppers', 'olive oil'],
    });
    await expect(createCheckFridgeTool(() => 0.7).execute({})).resolves.toEqual({
      success: true,
      data: ['tofu', 'soy sauce', 'broccoli', 'carrots'],
    });
  });
});
