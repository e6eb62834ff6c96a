export const createReader = 'not a function';
