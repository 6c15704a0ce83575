/**
 * navigation.test.ts
 *
 * Classification of link targets and the navigation service wrapper.
 */

import { describe, it, expect, vi } from 'vitest';
import { classifyUrlRequest, createNavigationService } from '../src/services/navigation';

const ORIGIN = 'http://localhost:3000';

describe('classifyUrlRequest', () => {
  it('treats relative paths as internal', () => {
    expect(classifyUrlRequest('/info', ORIGIN)).toEqual({ kind: 'internal', path: '/info' });
  });

  it('keeps query and fragment of same-origin urls', () => {
    expect(classifyUrlRequest('http://localhost:3000/settings?tab=1#top', ORIGIN)).toEqual({
      kind: 'internal',
      path: '/settings?tab=1#top',
    });
  });

  it('treats other origins as external', () => {
    expect(classifyUrlRequest('https://example.com/rules', ORIGIN)).toEqual({
      kind: 'external',
      href: 'https://example.com/rules',
    });
    expect(classifyUrlRequest('http://localhost:4000/info', ORIGIN)).toEqual({
      kind: 'external',
      href: 'http://localhost:4000/info',
    });
  });

  it('keeps an unparsable href as an internal path', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(classifyUrlRequest('http://[bad', ORIGIN)).toEqual({ kind: 'internal', path: 'http://[bad' });
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe('createNavigationService', () => {
  it('forwards internal pushes and external loads', () => {
    const push = vi.fn<(path: string) => void>();
    const load = vi.fn<(href: string) => void>();
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const navigation = createNavigationService({ push, load });

    navigation.pushInternal('/settings');
    navigation.loadExternal('https://example.com/');

    expect(push).toHaveBeenCalledWith('/settings');
    expect(load).toHaveBeenCalledWith('https://example.com/');
    expect(info).toHaveBeenCalledWith('[navigation]', 'Leaving app for:', 'https://example.com/');
    info.mockRestore();
  });
});
