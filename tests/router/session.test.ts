import { describe, it, expect, vi } from 'vitest';
import { RouterSession, withRouterSession } from '../../src/router/session.js';
import type { BrowserConnection, BrowserDriver } from '../../src/router/connection.js';

function fakeConnection(): BrowserConnection {
  return {
    goto: vi.fn(async () => {}),
    waitForClickable: vi.fn(async () => {}),
    waitForPresence: vi.fn(async () => {}),
    click: vi.fn(async () => {}),
    clear: vi.fn(async () => {}),
    type: vi.fn(async () => {}),
    clickAtPosition: vi.fn(async () => {}),
    readText: vi.fn(async () => ''),
    close: vi.fn(async () => {}),
  };
}

function session(conn: BrowserConnection, timeoutSeconds = 30) {
  const driver: BrowserDriver = { open: vi.fn(async () => conn) };
  return new RouterSession({
    routerUrl: 'http://192.168.1.1',
    routerPassword: 'test-secret',
    timeoutSeconds,
    headless: true,
    driver,
  });
}

describe('RouterSession', () => {
  it('starts new, opens on init and ends closed', async () => {
    const conn = fakeConnection();
    const s = session(conn);

    expect(s.state).toBe('new');
    await s.init();
    expect(s.state).toBe('open');
    expect(s.connection).toBe(conn);
    expect(conn.goto).toHaveBeenCalledWith('http://192.168.1.1', 30_000);

    await s.close();
    expect(s.state).toBe('closed');
  });

  it('closes the browser only once however often close is called', async () => {
    const conn = fakeConnection();
    const s = session(conn);

    await s.init();
    await s.close();
    await s.close();

    expect(conn.close).toHaveBeenCalledTimes(1);
    expect(conn.close).toHaveBeenCalledWith(30_000);
  });

  it('refuses to hand out the connection before init or after close', async () => {
    const s = session(fakeConnection());

    expect(() => s.connection).toThrow('Router session is new, not open');
    await s.init();
    await s.close();
    expect(() => s.connection).toThrow('Router session is closed, not open');
  });

  it('cannot be initialised twice', async () => {
    const s = session(fakeConnection());

    await s.init();
    await expect(s.init()).rejects.toThrow('Router session already open');
  });

  it('converts seconds to a millisecond budget with a 1ms floor', () => {
    expect(session(fakeConnection(), 12).timeoutMs).toBe(12_000);
    expect(session(fakeConnection(), 0).timeoutMs).toBe(1);
  });
});

describe('withRouterSession', () => {
  it('returns the callback result and closes', async () => {
    const conn = fakeConnection();

    const result = await withRouterSession(session(conn), async () => 'done');

    expect(result).toBe('done');
    expect(conn.close).toHaveBeenCalledTimes(1);
  });

  it('closes when the callback throws', async () => {
    const conn = fakeConnection();

    await expect(
      withRouterSession(session(conn), async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(conn.close).toHaveBeenCalledTimes(1);
  });
});
