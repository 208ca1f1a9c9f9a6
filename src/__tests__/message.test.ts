import { describe, it, expect } from 'vitest';
import { Message, PayloadType } from '../message.js';

describe('Message', () => {
  it('wraps a diagnostic frame', () => {
    const msg = new Message({ payloadType: PayloadType.Diagnostic, payload: Buffer.from([0x31, 0x01, 0xff, 0x00]) });

    expect(msg.isDiagnostic).toBe(true);
    expect(msg.serviceId).toBe(0x31);
    expect(msg.toString()).toBe('Message(Diagnostic, RoutineControl, 4 bytes)');
  });

  it('names positive responses after their request', () => {
    const msg = new Message({ payloadType: PayloadType.Diagnostic, payload: Buffer.from([0x71, 0x01, 0xff, 0x00]) });
    expect(msg.toString()).toBe('Message(Diagnostic, RoutineControlResponse, 4 bytes)');
  });

  it('names negative responses', () => {
    const msg = new Message({ payloadType: PayloadType.Diagnostic, payload: Buffer.from([0x7f, 0x37, 0x72]) });
    expect(msg.toString()).toBe('Message(Diagnostic, NegativeResponse, 3 bytes)');
  });

  it('has no service outside diagnostic frames', () => {
    const msg = new Message({ payloadType: PayloadType.VehicleIdRequest, payload: Buffer.alloc(0) });

    expect(msg.isDiagnostic).toBe(false);
    expect(msg.serviceId).toBeUndefined();
    expect(msg.toString()).toBe('Message(VehicleIdRequest, 0 bytes)');
  });

  it('handles unknown payload types in toString()', () => {
    const msg = new Message({ payloadType: 0x9999, payload: Buffer.from([1]) });
    expect(msg.toString()).toBe('Message(Unknown(0x9999), 1 bytes)');
  });
});
