// examples/shared/tools.ts

/**
 * @file Tools shared by the sample agents. The data is canned; only the dates are real.
 */

import { FunctionTool } from '../../src';

export interface Weather {
  city: string;
  temperature: number;
  description: string;
}

export interface Recipe {
  title: string;
  ingredients: string[];
  steps: string[];
}

/** Formats a date as YYYY-MM-DD in local time. */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/** Sunny one time in twenty, rainy otherwise. */
export function createWeatherTool(random: () => number = Math.random): FunctionTool<{ city: string }> {
  return new FunctionTool<{ city: string }>({
    name: 'get_weather',
    description: 'Returns weather data for a given city.',
    parameters: [{ name: 'city', type: 'string', description: 'The city to get the weather for.', required: true }],
    handler: ({ city }): Weather => {
      console.info(`[Tools] Getting weather for ${city}`);
      return random() < 0.05
        ? { city, temperature: 72, description: 'Sunny' }
        : { city, temperature: 60, description: 'Rainy' };
    },
  });
}

export function createActivitiesTool(): FunctionTool<{ city: string; date: string }> {
  return new FunctionTool<{ city: string; date: string }>({
    name: 'get_activities',
    description: 'Returns a list of activities for a given city and date.',
    parameters: [
      { name: 'city', type: 'string', description: 'The city to find activities in.', required: true },
      { name: 'date', type: 'string', description: 'The date, formatted YYYY-MM-DD.', required: true },
    ],
    handler: ({ city, date }) => {
      console.info(`[Tools] Getting activities for ${city} on ${date}`);
      return ['Hiking', 'Beach', 'Museum'].map((name) => ({ name, location: city }));
    },
  });
}

export function createCurrentDateTool(now: () => Date = () => new Date()): FunctionTool {
  return new FunctionTool({
    name: 'get_current_date',
    description: 'Gets the current date and returns it as a string in format YYYY-MM-DD.',
    handler: () => formatDate(now()),
  });
}

const RECIPES: Record<'pasta' | 'tofu' | 'fallback', Recipe> = {
  pasta: {
    title: 'Pasta Primavera',
    ingredients: ['pasta', 'vegetables', 'olive oil'],
    steps: ['Cook pasta.', 'Sauté vegetables.'],
  },
  tofu: {
    title: 'Tofu Stir Fry',
    ingredients: ['tofu', 'soy sauce', 'vegetables'],
    steps: ['Cube tofu.', 'Stir fry veggies.'],
  },
  fallback: {
    title: 'Grilled Cheese Sandwich',
    ingredients: ['bread', 'cheese', 'butter'],
    steps: ['Butter bread.', 'Place cheese between slices.', 'Grill until golden brown.'],
  },
};

export function createFindRecipesTool(): FunctionTool<{ query: string }> {
  return new FunctionTool<{ query: string }>({
    name: 'find_recipes',
    description: 'Returns recipes based on a query.',
    parameters: [{ name: 'query', type: 'string', description: 'What to cook, or an ingredient.', required: true }],
    handler: ({ query }): Recipe[] => {
      console.info(`[Tools] Finding recipes for "${query}"`);
      const normalized = query.toLowerCase();
      if (normalized.includes('pasta')) return [RECIPES.pasta];
      if (normalized.includes('tofu')) return [RECIPES.tofu];
      return [RECIPES.fallback];
    },
  });
}

/** Holds a pasta dinner half the time and a tofu dinner otherwise. */
export function createCheckFridgeTool(random: () => number = Math.random): FunctionTool {
  return new FunctionTool({
    name: 'check_fridge',
    description: 'Returns a list of ingredients currently in the fridge.',
    handler: (): string[] => {
      console.info('[Tools] Checking fridge for current ingredients');
      return random() < 0.5
        ? ['pasta', 'tomato sauce', 'bell peppers', 'olive oil']
        : ['tofu', 'soy sauce', 'broccoli', 'carrots'];
    },
  });
}
