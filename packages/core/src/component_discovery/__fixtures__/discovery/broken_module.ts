export const loaded = true;

throw new Error('fixture module failed to load');
