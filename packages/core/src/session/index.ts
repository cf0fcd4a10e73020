export * from './OddsSession.js';
