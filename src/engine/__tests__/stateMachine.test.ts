import { describe, it, expect } from 'vitest';
import { ResolutionStateMachine } from '../stateMachine.js';

describe('ResolutionStateMachine', () => {
  it('walks the convert protocol', () => {
    const machine = new ResolutionStateMachine();
    machine.advance('session_ready');
    machine.advance('initiated');
    machine.advance('converting');
    machine.advance('converting');
    machine.advance('ready');

    expect(machine.state).toBe('ready');
    expect(machine.history).toEqual(['idle', 'session_ready', 'initiated', 'converting', 'ready']);
  });

  it('allows a session refresh after initiation', () => {
    const machine = new ResolutionStateMachine();
    machine.advance('session_ready');
    machine.advance('initiated');
    machine.advance('session_ready');
    machine.advance('initiated');
    machine.advance('ready');
    expect(machine.state).toBe('ready');
  });

  it('lets session-less providers start at initiated', () => {
    const machine = new ResolutionStateMachine();
    machine.advance('initiated');
    machine.advance('ready');
    expect(machine.history).toEqual(['idle', 'initiated', 'ready']);
  });

  it('rejects skipping initiation', () => {
    const machine = new ResolutionStateMachine();
    machine.advance('session_ready');
    expect(() => machine.advance('converting')).toThrow(
      'Illegal resolution transition session_ready -> converting',
    );
  });

  it('treats terminal states as final', () => {
    const machine = new ResolutionStateMachine();
    machine.advance('initiated');
    machine.advance('ready');
    machine.fail();
    expect(machine.state).toBe('ready');
    expect(() => machine.advance('initiated')).toThrow();
  });

  it('fails from any live state', () => {
    const machine = new ResolutionStateMachine();
    machine.advance('session_ready');
    machine.fail();
    machine.fail();
    expect(machine.history).toEqual(['idle', 'session_ready', 'failed']);
  });
});
