/**
 * @peerchat/testing
 *
 * In-process transport doubles for exercising the chat session without a
 * WebRTC engine.
 *
 * @packageDocumentation
 */

export { FakeNetwork, FakePeer, type FakePeerOperation, type FakePeerOptions } from "./fake-peer.js";
