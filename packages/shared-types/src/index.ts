export * from './pan.types';
