/**
 * Builder module tests
 *
 * Tests for attribute framing, padding and the declared length field
 */

import { describe, it, expect } from 'vitest';
import {
  Message,
  MessageBuilder,
  MessageClass,
  Method,
  Software,
  Priority,
  UseCandidate,
  StunConversionError,
  StunEncodeError,
} from '../src/index.js';
import type { Attribute } from '../src/index.js';
import {
  TEST_TRANSACTION_ID,
  RawAttribute,
  bindingRequest,
  lengthField,
} from './fixtures.js';

/** Declares 4 bytes but writes 2 */
class ShortAttribute implements Attribute {
  readonly type = 0x7001;

  encodeLength(): number {
    return 4;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(new Uint8Array(2));
  }
}

/** Writes part of its value, then fails */
class FailingAttribute implements Attribute<string> {
  readonly type = 0x7005;

  encodeLength(): number {
    return 8;
  }

  encode(reason: string, builder: MessageBuilder): void {
    builder.append(new Uint8Array(3));
    throw new StunEncodeError(reason);
  }
}

/** Records the declared length visible while encoding */
class LengthProbe implements Attribute {
  readonly type = 0x7002;
  seenLength = -1;
  seenBufferLength = -1;

  encodeLength(): number {
    return 6;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    this.seenLength = lengthField(builder.bytes());
    this.seenBufferLength = builder.length;
    builder.append(new Uint8Array(6));
  }
}

describe('MessageBuilder', () => {
  it('should start with a header and zero length', () => {
    const bytes = bindingRequest().finish();

    expect(bytes.length).toBe(20);
    expect(lengthField(bytes)).toBe(0);
    expect(bytes[1]).toBe(0x01);
  });

  it('should write the attribute header, value and zero padding', () => {
    const builder = bindingRequest();
    builder.addAttr(new Software('abc'));
    const bytes = builder.finish();

    expect(bytes.length).toBe(28);
    expect(lengthField(bytes)).toBe(8);
    expect(Array.from(bytes.subarray(20))).toEqual([
      0x80, 0x22, 0x00, 0x03, 0x61, 0x62, 0x63, 0x00,
    ]);
  });

  it('should keep the declared length in step with the buffer', () => {
    const builder = bindingRequest();

    builder.addAttr(new Software('abcde'));
    expect(lengthField(builder.bytes())).toBe(builder.length - 20);

    builder.addAttr(new Priority(1));
    expect(lengthField(builder.bytes())).toBe(builder.length - 20);

    builder.addAttr(new UseCandidate());
    expect(lengthField(builder.bytes())).toBe(builder.length - 20);
    expect(builder.length).toBe(20 + 12 + 8 + 4);
  });

  it('should cover the attribute being written in the declared length', () => {
    const probe = new LengthProbe();
    const builder = bindingRequest();
    builder.addAttr(new Software('abc'));
    builder.addAttr(probe);

    // Buffer ends after the probe's header; length includes its padded value
    expect(probe.seenBufferLength).toBe(32);
    expect(probe.seenLength).toBe(8 + 4 + 8);
    expect(builder.length).toBe(40);
  });

  it('should reject an attribute that writes the wrong number of bytes', () => {
    const builder = bindingRequest();

    expect(() => builder.addAttr(new ShortAttribute())).toThrow(StunEncodeError);
    expect(() => bindingRequest().addAttr(new ShortAttribute())).toThrow(
      /wrote 2 bytes, declared 4/
    );
  });

  it('should reject values longer than 16 bits can describe', () => {
    const builder = bindingRequest();

    expect(() => builder.addAttr(new RawAttribute(0x7003, new Uint8Array(0x10000)))).toThrow(
      StunConversionError
    );
  });

  it('should reject a declared length wider than 16 bits', () => {
    expect(() => bindingRequest().setDeclaredLength(0x10000)).toThrow(StunConversionError);
  });

  it('should grow past its initial capacity', () => {
    const builder = bindingRequest();
    const value = new Uint8Array(1000).map((_, i) => i & 0xff);
    builder.addAttr(new RawAttribute(0x7004, value));

    const bytes = builder.finish();
    expect(bytes.length).toBe(1024);
    expect(bytes.subarray(24)).toEqual(value);
  });

  it('should return independent copies from finish', () => {
    const builder = bindingRequest();
    const first = builder.finish();
    builder.addAttr(new Priority(7));

    expect(first.length).toBe(20);
    expect(builder.finish().length).toBe(28);
  });

  it('should carry class, method and transaction id', () => {
    const builder = new MessageBuilder(MessageClass.Success, Method.Binding, TEST_TRANSACTION_ID);
    const bytes = builder.finish();

    expect(builder.transactionId).toBe(TEST_TRANSACTION_ID);
    expect(Array.from(bytes.subarray(0, 2))).toEqual([0x01, 0x01]);
    expect(bytes.subarray(8, 20)).toEqual(TEST_TRANSACTION_ID.toBytes());
  });

  describe('after a failed attribute', () => {
    function withSoftware(): MessageBuilder {
      const builder = bindingRequest();
      builder.addAttr(new Software('abc'));
      return builder;
    }

    it('should discard bytes from an attribute that throws while encoding', () => {
      const builder = withSoftware();

      expect(() => builder.addAttrWith(new FailingAttribute(), 'no key')).toThrow('no key');
      expect(builder.length).toBe(28);
      expect(lengthField(builder.bytes())).toBe(8);
    });

    it('should discard bytes from an attribute that writes the wrong amount', () => {
      const builder = withSoftware();

      expect(() => builder.addAttr(new ShortAttribute())).toThrow(StunEncodeError);
      expect(builder.length).toBe(28);
      expect(lengthField(builder.bytes())).toBe(8);
    });

    it('should write nothing when the message would outgrow 16 bits', () => {
      const builder = bindingRequest();
      builder.addAttr(new RawAttribute(0x7006, new Uint8Array(65004)));
      expect(builder.length).toBe(65028);

      expect(() => builder.addAttr(new RawAttribute(0x7007, new Uint8Array(1000)))).toThrow(
        StunConversionError
      );
      expect(builder.length).toBe(65028);
      expect(lengthField(builder.bytes())).toBe(65008);
    });

    it('should keep producing parseable messages', () => {
      const builder = withSoftware();
      expect(() => builder.addAttrWith(new FailingAttribute(), 'no key')).toThrow();
      builder.addAttr(new Priority(7));

      const msg = Message.parse(builder.finish());
      expect(msg.spans.map((span) => span.type)).toEqual([0x8022, 0x0024]);
      expect(msg.attribute(Priority)?.value).toBe(7);
    });
  });
});
