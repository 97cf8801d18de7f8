/**
 * Tests for the signature extractor
 */

import { describe, it, expect } from 'vitest';
import { extractSignature, renderSignature } from '../signature.js';

describe('extractSignature', () => {
  it('extracts a free function', () => {
    const record = extractSignature('func NewClient(addr string) *Client');

    expect(record).toEqual({
      name: 'NewClient',
      signature: 'func NewClient(addr string) *Client',
      description: '',
      receiver: '',
      typeParams: '',
      params: '(addr string)',
      returns: '*Client',
    });
  });

  it('extracts a method with a trailing description', () => {
    const record = extractSignature(
      'func (c *Client) Get(key string) (string, error)    returns the stored value'
    );

    expect(record).toEqual({
      name: 'Get',
      signature: 'func (c *Client) Get(key string) (string, error)',
      description: 'returns the stored value',
      receiver: 'c *Client',
      typeParams: '',
      params: '(key string)',
      returns: '(string, error)',
    });
  });

  it('leaves returns empty when the description follows the parameters', () => {
    const record = extractSignature('func Reset()    clears every entry');

    expect(record?.returns).toBe('');
    expect(record?.description).toBe('clears every entry');
    expect(record?.signature).toBe('func Reset()');
  });

  it('defaults params to () when the line has no parameter group', () => {
    const record = extractSignature('func Version');

    expect(record?.params).toBe('()');
    expect(record?.returns).toBe('');
    expect(record?.signature).toBe('func Version()');
  });

  it('keeps nested parentheses inside the parameter group', () => {
    const record = extractSignature('func Walk(fn func(string) error) error');

    expect(record?.params).toBe('(fn func(string) error)');
    expect(record?.returns).toBe('error');
  });

  it('accepts single-letter exported names', () => {
    expect(extractSignature('func F(x int) int')?.name).toBe('F');
  });

  it('returns null for unexported names', () => {
    expect(extractSignature('func get(key string) string')).toBeNull();
    expect(extractSignature('func (c *Client) get() string')).toBeNull();
  });

  it('returns null for lines that are not declarations', () => {
    expect(extractSignature('function Get()')).toBeNull();
    expect(extractSignature('    func Get()')).toBeNull();
    expect(extractSignature('type Config struct {')).toBeNull();
  });

  it('honours a custom description gap', () => {
    const line = 'func Len() int  number of entries';

    expect(extractSignature(line)?.returns).toBe('int  number of entries');

    const record = extractSignature(line, { descriptionGap: 2 });
    expect(record?.returns).toBe('int');
    expect(record?.description).toBe('number of entries');
  });

  it('splits at the last wide gap', () => {
    const record = extractSignature('func Pair() (int, int)    first    second');

    expect(record?.returns).toBe('(int, int)    first');
    expect(record?.description).toBe('second');
  });

  it('reads type parameters between the name and the parameters', () => {
    const record = extractSignature('func Map[S ~[]E, E any](s S, fn func(E) E) S');

    expect(record?.name).toBe('Map');
    expect(record?.typeParams).toBe('[S ~[]E, E any]');
    expect(record?.params).toBe('(s S, fn func(E) E)');
    expect(record?.returns).toBe('S');
    expect(record?.signature).toBe('func Map[S ~[]E, E any](s S, fn func(E) E) S');
  });

  it('keeps the type arguments of a generic receiver', () => {
    const record = extractSignature('func (l *List[T]) Push(v T)');

    expect(record?.receiver).toBe('l *List[T]');
    expect(record?.typeParams).toBe('');
    expect(record?.signature).toBe('func (l *List[T]) Push(v T)');
  });

  it('takes padding inside the parameters for a description', () => {
    // Known limitation of the gap heuristic
    const record = extractSignature('func Join(a string,    b string) string');

    expect(record?.params).toBe('(a string,    b string)');
    expect(record?.returns).toBe('string');
    expect(record?.description).toBe('b string) string');
  });
});

describe('renderSignature', () => {
  it('omits the receiver and returns when empty', () => {
    expect(renderSignature({ receiver: '', name: 'Close', typeParams: '', params: '()', returns: '' })).toBe(
      'func Close()'
    );
  });

  it('renders every part', () => {
    expect(
      renderSignature({
        receiver: 's *Server',
        name: 'Serve',
        typeParams: '',
        params: '(l net.Listener)',
        returns: 'error',
      })
    ).toBe('func (s *Server) Serve(l net.Listener) error');
  });

  it('reproduces the signature of an extracted record', () => {
    const line = 'func (s *Store) Put(key string, value []byte) error';
    const record = extractSignature(line);

    expect(record).not.toBeNull();
    if (record) {
      expect(renderSignature(record)).toBe(line);
      expect(extractSignature(record.signature)).toEqual(record);
    }
  });
});
