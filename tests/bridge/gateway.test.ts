/**
 * Tests for the inbound pipeline with fake outbound collaborators.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";

import { InboundGateway, outcomeResponse, type GatewayOutcome } from "../../src/bridge/gateway.js";
import { silentLogger } from "../../src/bridge/logger.js";
import {
  BodyReadError,
  EnvelopeDecodeError,
  SignatureMismatchError,
} from "../../src/protocol/errors.js";
import { TEST_SECRET, chatEnvelope, signedDelivery } from "../helpers/talk.js";

const BACKEND = "https://cloud.example.com/";

describe("InboundGateway", () => {
  let dispatch: Mock<(...args: unknown[]) => Promise<boolean>>;
  let notify: Mock<(...args: unknown[]) => Promise<boolean>>;
  let gateway: InboundGateway;

  beforeEach(() => {
    dispatch = vi.fn<(...args: unknown[]) => Promise<boolean>>().mockResolvedValue(true);
    notify = vi.fn<(...args: unknown[]) => Promise<boolean>>().mockResolvedValue(true);
    gateway = new InboundGateway({
      config: {
        secret: TEST_SECRET,
        successReplies: ["Done!"],
        failureReply: "Error calling Home Assistant",
      },
      automation: { dispatch },
      notifier: { notify },
      logger: silentLogger(),
    });
  });

  function deliver(body: string, secret: string = TEST_SECRET): Promise<GatewayOutcome> {
    const { body: bytes, nonce, signature } = signedDelivery(body, secret);
    return gateway.handle({ body: bytes, backendUrl: BACKEND, nonce, signature });
  }

  // -- Rejections ----------------------------------------------------------

  it("rejects an unreadable body", async () => {
    const outcome = await gateway.handle({ body: null, backendUrl: BACKEND, nonce: "", signature: "" });
    expect(outcome).toMatchObject({ kind: "rejected", reason: "body-unreadable" });
    if (outcome.kind === "rejected") {
      expect(outcome.error).toBeInstanceOf(BodyReadError);
    }
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it("rejects a signature made with another secret", async () => {
    const outcome = await deliver(chatEnvelope("@ha turn_on light1"), "wrong-secret");
    expect(outcome).toMatchObject({ kind: "rejected", reason: "signature-mismatch" });
    if (outcome.kind === "rejected") {
      expect(outcome.error).toBeInstanceOf(SignatureMismatchError);
    }
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it("rejects a body altered after signing", async () => {
    const delivery = signedDelivery(chatEnvelope("@ha turn_on light1"));
    const tampered = Buffer.from(chatEnvelope("@ha turn_off light1"));
    const outcome = await gateway.handle({
      body: tampered,
      backendUrl: BACKEND,
      nonce: delivery.nonce,
      signature: delivery.signature,
    });
    expect(outcome).toMatchObject({ kind: "rejected", reason: "signature-mismatch" });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("rejects missing signature headers", async () => {
    const outcome = await gateway.handle({
      body: Buffer.from(chatEnvelope("@ha turn_on light1")),
      backendUrl: BACKEND,
      nonce: "",
      signature: "",
    });
    expect(outcome).toMatchObject({ kind: "rejected", reason: "signature-mismatch" });
  });

  it("rejects a correctly signed body that is not JSON", async () => {
    const outcome = await deliver("not json at all");
    expect(outcome).toMatchObject({ kind: "rejected", reason: "envelope-invalid" });
    if (outcome.kind === "rejected") {
      expect(outcome.error).toBeInstanceOf(EnvelopeDecodeError);
    }
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it("rejects an envelope whose fields have the wrong type", async () => {
    const outcome = await deliver('{"type":"Create","object":{"name":"message","content":5}}');
    expect(outcome).toMatchObject({ kind: "rejected", reason: "envelope-invalid" });
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  // -- Ignored -------------------------------------------------------------

  it("ignores envelopes that are not chat messages", async () => {
    const outcome = await deliver(chatEnvelope("@ha turn_on light1", { objectName: "call_joined" }));
    expect(outcome).toEqual({ kind: "ignored", reason: "not-a-chat-message" });
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it("drops messages whose rich-text content is malformed", async () => {
    const outcome = await deliver(chatEnvelope("", { content: "@ha turn_on light1" }));
    expect(outcome).toEqual({ kind: "ignored", reason: "rich-text-invalid" });
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it("drops messages whose rich-text message is not a string", async () => {
    const outcome = await deliver(chatEnvelope("", { content: '{"message":7}' }));
    expect(outcome).toEqual({ kind: "ignored", reason: "rich-text-invalid" });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("ignores a command with doubled spaces", async () => {
    const outcome = await deliver(chatEnvelope("@ha  turn_on light1"));
    expect(outcome).toEqual({ kind: "ignored", reason: "non-command" });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("ignores plain chat text", async () => {
    const outcome = await deliver(chatEnvelope("good morning"));
    expect(outcome).toEqual({ kind: "ignored", reason: "non-command" });
    expect(dispatch).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it("ignores a trigger without a target", async () => {
    const outcome = await deliver(chatEnvelope("@ha turn_on"));
    expect(outcome).toEqual({ kind: "ignored", reason: "non-command" });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("ignores a marker that is not at the start", async () => {
    const outcome = await deliver(chatEnvelope("hello @ha turn_on light1"));
    expect(outcome).toEqual({ kind: "ignored", reason: "non-command" });
    expect(dispatch).not.toHaveBeenCalled();
  });

  // -- Dispatched ----------------------------------------------------------

  it("dispatches a command and acknowledges success", async () => {
    const outcome = await deliver(chatEnvelope("@ha turn_on light1"));

    expect(outcome).toEqual({
      kind: "dispatched",
      command: { action: "turn_on", target: "light1" },
      automationSucceeded: true,
      replyText: "Done!",
      replyDelivered: true,
    });
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0][0]).toEqual({ action: "turn_on", target: "light1" });
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify.mock.calls[0][0]).toEqual({
      backendUrl: BACKEND,
      roomId: "room1",
      replyTo: "1567",
    });
    expect(notify.mock.calls[0][1]).toBe("Done!");
  });

  it("replies with the error text when the automation call fails", async () => {
    dispatch.mockResolvedValue(false);
    const outcome = await deliver(chatEnvelope("@ha turn_on light1"));

    expect(outcome).toMatchObject({
      kind: "dispatched",
      automationSucceeded: false,
      replyText: "Error calling Home Assistant",
    });
    expect(notify.mock.calls[0][1]).toBe("Error calling Home Assistant");
  });

  it("reports an undelivered reply in the outcome", async () => {
    notify.mockResolvedValue(false);
    const outcome = await deliver(chatEnvelope("@ha turn_on light1"));
    expect(outcome).toMatchObject({ kind: "dispatched", replyDelivered: false });
  });

  it("passes the request signal to both outbound calls", async () => {
    const controller = new AbortController();
    const { body, nonce, signature } = signedDelivery(chatEnvelope("@ha turn_on light1"));
    await gateway.handle({ body, backendUrl: BACKEND, nonce, signature, signal: controller.signal });

    expect(dispatch.mock.calls[0][1]).toEqual({ signal: controller.signal });
    expect(notify.mock.calls[0][2]).toEqual({ signal: controller.signal });
  });

  it("picks the acknowledgement from the configured replies", async () => {
    const pickReply = vi.fn((replies: readonly string[]) => replies[1]);
    gateway = new InboundGateway({
      config: { secret: TEST_SECRET, successReplies: ["Done!", "On it!"], failureReply: "Nope" },
      automation: { dispatch },
      notifier: { notify },
      logger: silentLogger(),
      pickReply,
    });

    const outcome = await deliver(chatEnvelope("@ha turn_off fan"));
    expect(pickReply).toHaveBeenCalledWith(["Done!", "On it!"]);
    expect(outcome).toMatchObject({ replyText: "On it!" });
  });

  it("accepts a replayed delivery (nonces are not tracked)", async () => {
    const { body, nonce, signature } = signedDelivery(chatEnvelope("@ha turn_on light1"));
    const first = await gateway.handle({ body, backendUrl: BACKEND, nonce, signature });
    const second = await gateway.handle({ body, backendUrl: BACKEND, nonce, signature });

    expect(first.kind).toBe("dispatched");
    expect(second.kind).toBe("dispatched");
    expect(dispatch).toHaveBeenCalledTimes(2);
  });
});

describe("outcomeResponse", () => {
  it("maps rejections to 400 with the error message", () => {
    expect(
      outcomeResponse({
        kind: "rejected",
        reason: "signature-mismatch",
        error: new SignatureMismatchError("Invalid signature"),
      })
    ).toEqual({ status: 400, body: "Invalid signature" });
  });

  it("maps ignored and dispatched outcomes to 200 Received", () => {
    expect(outcomeResponse({ kind: "ignored", reason: "non-command" })).toEqual({
      status: 200,
      body: "Received",
    });
    expect(
      outcomeResponse({
        kind: "dispatched",
        command: { action: "a", target: "b" },
        automationSucceeded: false,
        replyText: "Error calling Home Assistant",
        replyDelivered: true,
      })
    ).toEqual({ status: 200, body: "Received" });
  });
});
