export * from './lexer';
