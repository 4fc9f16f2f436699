import debug from 'debug';

export const log = Object.assign(debug('schema-checker'), {
  compile: debug('schema-checker:compile'),
  ref: debug('schema-checker:ref'),
  format: debug('schema-checker:format')
});
