import { describe, it } from "node:test";
import assert from "node:assert";
import { actorEmail, actorId, actorName, decodeActor } from "./actor.js";
import { MalformedPayloadError, UnknownActorTypeError } from "./errors.js";

describe("decodeActor", () => {
  it("decodes a workspace user", () => {
    const a = decodeActor({ user: { id: "u_1", fullName: "Ana Ruiz", email: "ana@example.com" } });
    assert.deepStrictEqual(a, { kind: "user", user: { id: "u_1", fullName: "Ana Ruiz", email: "ana@example.com" } });
  });

  it("flattens a customer's nested email", () => {
    const a = decodeActor({ customer: { id: "c_1", fullName: "Bo Lind", email: { email: "bo@example.com" } } });
    assert.deepStrictEqual(a, { kind: "customer", customer: { id: "c_1", fullName: "Bo Lind", email: "bo@example.com" } });
  });

  it("fills missing nested fields with empty strings", () => {
    assert.deepStrictEqual(decodeActor({ customer: { id: "c_2" } }), {
      kind: "customer",
      customer: { id: "c_2", fullName: "", email: "" }
    });
    assert.deepStrictEqual(decodeActor({ user: {} }), { kind: "user", user: { id: "", fullName: "", email: "" } });
  });

  it("decodes deleted customers, system and machine users", () => {
    assert.deepStrictEqual(decodeActor({ customerId: "c_9" }), { kind: "deletedCustomer", customerId: "c_9" });
    assert.deepStrictEqual(decodeActor({ systemId: "sys_1" }), { kind: "system", systemId: "sys_1" });
    assert.deepStrictEqual(decodeActor({ machineUser: { id: "m_1", fullName: "Importer" } }), {
      kind: "machineUser",
      machineUser: { id: "m_1", fullName: "Importer", email: "" }
    });
  });

  it("prefers user over customer when both are present", () => {
    const a = decodeActor({ customer: { id: "c_1" }, user: { id: "u_1" } });
    assert.strictEqual(a.kind, "user");
  });

  it("skips discriminators that are null", () => {
    assert.strictEqual(decodeActor({ user: null, systemId: "sys_1" }).kind, "system");
  });

  it("throws UnknownActorTypeError when no shape matches", () => {
    assert.throws(() => decodeActor({ bot: { id: "b" } }), (err: unknown) => {
      assert.ok(err instanceof UnknownActorTypeError);
      assert.deepStrictEqual(err.keys, ["bot"]);
      assert.strictEqual(err.message, "unknown actor type (keys: bot)");
      return true;
    });
    assert.throws(() => decodeActor({}), { message: "unknown actor type (keys: none)" });
  });

  it("reports a null or absent actor as unknown", () => {
    assert.throws(() => decodeActor(null), (err: unknown) => {
      assert.ok(err instanceof UnknownActorTypeError);
      assert.deepStrictEqual(err.keys, []);
      return true;
    });
    assert.throws(() => decodeActor(undefined), UnknownActorTypeError);
  });

  it("throws MalformedPayloadError for a non-object payload", () => {
    assert.throws(() => decodeActor("x"), (err: unknown) => {
      assert.ok(err instanceof MalformedPayloadError);
      assert.strictEqual(err.path, "actor");
      assert.strictEqual(err.message, "malformed payload at actor: expected object, got string");
      return true;
    });
    assert.throws(() => decodeActor([]), { message: "malformed payload at actor: expected object, got array" });
  });

  it("reports the path of a wrongly typed field", () => {
    const pathOf = (raw: unknown) => {
      try {
        decodeActor(raw, "timelineEntry.actor");
      } catch (err) {
        if (err instanceof MalformedPayloadError) return err.path;
        throw err;
      }
      return null;
    };
    assert.strictEqual(pathOf({ user: "nope" }), "timelineEntry.actor.user");
    assert.strictEqual(pathOf({ user: { id: 5 } }), "timelineEntry.actor.user.id");
    assert.strictEqual(pathOf({ systemId: 42 }), "timelineEntry.actor.systemId");
  });
});

describe("actor accessors", () => {
  it("projects a machine user", () => {
    const bot = decodeActor({ machineUser: { id: "m1", fullName: "Bot", email: "b@x" } });
    assert.strictEqual(bot.kind, "machineUser");
    assert.strictEqual(actorId(bot), "m1");
    assert.strictEqual(actorName(bot), "Bot");
    assert.strictEqual(actorEmail(bot), "b@x");
  });

  it("name, id and email per kind", () => {
    const deleted = decodeActor({ customerId: "c_9" });
    assert.strictEqual(actorName(deleted), "[Deleted Customer]");
    assert.strictEqual(actorId(deleted), "c_9");
    assert.strictEqual(actorEmail(deleted), "");

    const system = decodeActor({ systemId: "sys_1" });
    assert.strictEqual(actorName(system), "System");
    assert.strictEqual(actorId(system), "sys_1");

    const customer = decodeActor({ customer: { id: "c_1", fullName: "Bo", email: { email: "bo@example.com" } } });
    assert.strictEqual(actorEmail(customer), "bo@example.com");
  });
});
