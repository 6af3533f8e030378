import type { Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { createApp } from "../../src/app.js";
import { bearer, signUp, type SignedUp } from "../helpers/api.js";
import { makeContext } from "../helpers/factories.js";
import type { MemoryStores } from "../helpers/memoryStores.js";

describe("friend requests, friendships and messages over HTTP", () => {
  let app: Express;
  let stores: MemoryStores;
  let alice: SignedUp;
  let bob: SignedUp;
  let carol: SignedUp;

  beforeEach(async () => {
    const made = makeContext();
    stores = made.stores;
    app = createApp(made.ctx);
    alice = await signUp(app);
    bob = await signUp(app);
    carol = await signUp(app);
  });

  /** alice -> bob by contact key, bob accepts and records the friendship */
  async function aliceAndBobBecomeFriends() {
    const sent = await request(app)
      .post("/friend-requests")
      .set(bearer(alice))
      .send({ contactKey: bob.contactKey })
      .expect(201);
    await request(app)
      .patch(`/friend-requests/${sent.body.request.id}`)
      .set(bearer(bob))
      .send({ isAccepted: true })
      .expect(200);
    const created = await request(app)
      .post("/friends")
      .set(bearer(bob))
      .send({ userId: alice.id })
      .expect(201);
    return { requestId: String(sent.body.request.id), friendshipId: String(created.body.friendship.id) };
  }

  it("runs the whole flow from request to conversation", async () => {
    await aliceAndBobBecomeFriends();

    await request(app)
      .post("/messages")
      .set(bearer(alice))
      .send({ content: "hi bob", toUserId: bob.id })
      .expect(201);

    const convo = await request(app)
      .get("/messages")
      .query({ friendId: alice.id })
      .set(bearer(bob))
      .expect(200);
    expect(convo.body.items).toHaveLength(1);
    expect(convo.body.items[0]).toMatchObject({
      content: "hi bob",
      fromUserId: alice.id,
      toUserId: bob.id,
      isNew: true,
    });

    const unread = await request(app).get("/messages/unread-count").set(bearer(bob)).expect(200);
    expect(unread.body).toEqual({ count: 1 });
  });

  it("answers 409 for a duplicate request in either direction", async () => {
    await request(app)
      .post("/friend-requests")
      .set(bearer(alice))
      .send({ toUserId: bob.id })
      .expect(201);

    const reverse = await request(app)
      .post("/friend-requests")
      .set(bearer(bob))
      .send({ toUserId: alice.id })
      .expect(409);
    expect(reverse.body.error).toMatchObject({
      code: "DUPLICATE_REQUEST",
      kind: "DUPLICATE_REQUEST",
      message: "This user has already sent you a friend request",
    });
  });

  it("needs exactly one of contactKey and toUserId", async () => {
    await request(app).post("/friend-requests").set(bearer(alice)).send({}).expect(422);
    await request(app)
      .post("/friend-requests")
      .set(bearer(alice))
      .send({ contactKey: bob.contactKey, toUserId: bob.id })
      .expect(422);
  });

  it("lists incoming and outgoing boxes", async () => {
    await request(app).post("/friend-requests").set(bearer(alice)).send({ toUserId: bob.id }).expect(201);
    await request(app).post("/friend-requests").set(bearer(carol)).send({ toUserId: bob.id }).expect(201);

    const incoming = await request(app).get("/friend-requests").set(bearer(bob)).expect(200);
    expect(incoming.body.items.map((r: { fromUserId: string }) => r.fromUserId)).toEqual([
      carol.id,
      alice.id,
    ]);

    const outgoing = await request(app)
      .get("/friend-requests")
      .query({ box: "outgoing" })
      .set(bearer(alice))
      .expect(200);
    expect(outgoing.body.items).toHaveLength(1);
  });

  it("keeps request fields other than the flags read-only", async () => {
    const sent = await request(app)
      .post("/friend-requests")
      .set(bearer(alice))
      .send({ toUserId: bob.id })
      .expect(201);

    await request(app)
      .patch(`/friend-requests/${sent.body.request.id}`)
      .set(bearer(bob))
      .send({ fromUserId: carol.id })
      .expect(422);

    const bySender = await request(app)
      .patch(`/friend-requests/${sent.body.request.id}`)
      .set(bearer(alice))
      .send({ isAccepted: true })
      .expect(403);
    expect(bySender.body.error.kind).toBe("FORBIDDEN");
  });

  it("refuses a friendship without a request with NO_REQUEST", async () => {
    const res = await request(app)
      .post("/friends")
      .set(bearer(carol))
      .send({ userId: alice.id })
      .expect(400);
    expect(res.body.error).toMatchObject({
      code: "NO_REQUEST",
      kind: "PRECONDITION_FAILED",
      message: "Can't create a friendship without a friend request",
    });
  });

  it("refuses messages between non-friends", async () => {
    const res = await request(app)
      .post("/messages")
      .set(bearer(alice))
      .send({ content: "hi", toUserId: carol.id })
      .expect(400);
    expect(res.body.error.code).toBe("NOT_FRIENDS");

    await request(app).get("/messages").query({ friendId: carol.id }).set(bearer(alice)).expect(404);
  });

  it("keeps the friendship when its request is deleted", async () => {
    const { requestId, friendshipId } = await aliceAndBobBecomeFriends();

    await request(app).delete(`/friend-requests/${requestId}`).set(bearer(alice)).expect(204);

    const status = await request(app).get(`/friends/status/${bob.id}`).set(bearer(alice)).expect(200);
    expect(status.body).toEqual({ areFriends: true, request: null });
    await request(app).get(`/friends/${friendshipId}`).set(bearer(alice)).expect(200);
  });

  it("lets the owner block, which stops messages", async () => {
    const { friendshipId } = await aliceAndBobBecomeFriends();

    await request(app)
      .patch(`/friends/${friendshipId}`)
      .set(bearer(alice))
      .send({ isBlocked: true })
      .expect(403);
    const blocked = await request(app)
      .patch(`/friends/${friendshipId}`)
      .set(bearer(bob))
      .send({ isBlocked: true, nickname: "Al" })
      .expect(200);
    expect(blocked.body.friendship).toMatchObject({ isBlocked: true, nickname: "Al" });

    const res = await request(app)
      .post("/messages")
      .set(bearer(alice))
      .send({ content: "hello?", toUserId: bob.id })
      .expect(403);
    expect(res.body.error.code).toBe("BLOCKED");
  });

  it("resolves a contact key to a contact card", async () => {
    const res = await request(app).get(`/users/by-key/${bob.contactKey}`).set(bearer(alice)).expect(200);
    expect(res.body.user).toEqual({ id: bob.id, username: bob.username, contactKey: bob.contactKey });
  });

  it("deleting an account removes its relationships and messages", async () => {
    await aliceAndBobBecomeFriends();
    await request(app)
      .post("/messages")
      .set(bearer(bob))
      .send({ content: "bye", toUserId: alice.id })
      .expect(201);

    await request(app).delete("/users/me").set(bearer(alice)).expect(204);

    expect(await stores.users.findById(alice.id)).toBeNull();
    expect(stores.friendRequests.rows.size).toBe(0);
    expect(stores.friendships.rows.size).toBe(0);
    expect(stores.messages.rows.size).toBe(0);
    const friends = await request(app).get("/friends").set(bearer(bob)).expect(200);
    expect(friends.body.items).toEqual([]);
  });
});
