export { consoleLogger } from './logger';
export { getWords, splitWordsOnRegex, toSnake } from './snake';
