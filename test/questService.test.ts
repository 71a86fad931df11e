import { describe, expect, it } from "vitest";

import { questRewardId } from "../src/services/rewardDistributor";
import { buildEngine, DAY_MS, openQuest, sampleDraft, submittedQuest } from "./helpers";

describe("QuestService lifecycle", () => {
	it("takes a quest from creation to completion and pays the performer once", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		expect(quest.status).toBe("SUBMITTED");
		expect(quest.submissionText).toBe("Both panels replaced, photos attached.");

		const first = await engine.service.attestCompletion(quest.id, "alice", 5, "Great work");
		if (!first.ok) {
			throw first.error;
		}
		expect(first.value.status).toBe("SUBMITTED");
		expect(first.value.hasRequesterAttestation).toBe(true);
		expect(first.value.hasPerformerAttestation).toBe(false);

		const second = await engine.service.attestCompletion(quest.id, "bob", 4, null);
		if (!second.ok) {
			throw second.error;
		}
		expect(second.value.status).toBe("COMPLETE");
		expect(second.value.completedAt).toBe("2024-03-01T12:00:00.000Z");
		expect(second.value.attesterIds).toEqual(["alice", "bob"]);
		expect(second.value.attestations.map((entry) => [entry.attesterId, entry.role, entry.rating, entry.comment])).toEqual([
			["alice", "requester", 5, "Great work"],
			["bob", "performer", 4, null],
		]);

		const bob = await engine.users.get("bob");
		expect(bob?.xp).toBe(100);
		expect(bob?.reputation).toBe(10);
		expect(bob?.questCreationBalance).toBe(12);
		expect(bob?.processedRewardIds).toEqual([questRewardId(quest.id)]);

		const alice = await engine.users.get("alice");
		expect(alice?.questCreationBalance).toBe(9);
		expect(alice?.xp).toBe(0);
	});

	it("accepts short evidence and pays the performer on completion", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);

		const claimed = await engine.service.claimQuest(quest.id, "bob");
		expect(claimed.ok ? claimed.value.status : null).toBe("CLAIMED");
		const submitted = await engine.service.submitWork(quest.id, "bob", "done");
		expect(submitted.ok ? [submitted.value.status, submitted.value.submissionText] : null).toEqual(["SUBMITTED", "done"]);

		const requester = await engine.service.attestCompletion(quest.id, "alice", 5, null);
		expect(requester.ok ? requester.value.hasRequesterAttestation : null).toBe(true);
		const performer = await engine.service.attestCompletion(quest.id, "bob", 5, null);
		expect(performer.ok ? [performer.value.hasPerformerAttestation, performer.value.status] : null).toEqual([
			true,
			"COMPLETE",
		]);

		const bob = await engine.users.get("bob");
		expect([bob?.xp, bob?.reputation]).toEqual([100, 10]);
		expect(bob?.processedRewardIds).toEqual([questRewardId(quest.id)]);
	});

	it("rejects evidence that is empty after cleaning", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		await engine.service.claimQuest(quest.id, "bob");
		const result = await engine.service.submitWork(quest.id, "bob", "  <p></p> ");
		expect(result.ok ? null : result.error.message).toBe("evidence must not be empty");
	});

	it("forbids claiming your own quest", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		const result = await engine.service.claimQuest(quest.id, "alice");
		expect(result.ok).toBe(false);
		expect(result.ok ? null : result.error.kind).toBe("forbidden");
	});

	it("returns NotFound for an unknown quest", async () => {
		const engine = buildEngine();
		const result = await engine.service.claimQuest("no-such-quest", "bob");
		expect(result.ok ? null : result.error.message).toBe("quest no-such-quest was not found.");
	});

	it("lets exactly one of two concurrent claims win", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		await engine.service.registerUser("carol");

		const results = await Promise.all([
			engine.service.claimQuest(quest.id, "bob"),
			engine.service.claimQuest(quest.id, "carol"),
		]);
		const performers = results.flatMap((result) => (result.ok ? [result.value.performerId] : []));
		const losers = results.flatMap((result) => (result.ok ? [] : [result.error.kind]));
		expect(losers).toEqual(["conflict"]);

		const stored = await engine.quests.get(quest.id);
		expect(stored?.status).toBe("CLAIMED");
		expect(performers).toEqual([stored?.performerId]);
	});

	it("reports a second claim after the first has landed as a conflict", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		await engine.service.registerUser("carol");
		await engine.service.claimQuest(quest.id, "bob");
		const late = await engine.service.claimQuest(quest.id, "carol");
		expect(late.ok ? null : late.error.kind).toBe("conflict");
	});

	it("completes when both parties attest concurrently", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);

		const [requester, performer] = await Promise.all([
			engine.service.attestCompletion(quest.id, "alice", 5, null),
			engine.service.attestCompletion(quest.id, "bob", 5, null),
		]);
		expect(requester.ok).toBe(true);
		expect(performer.ok).toBe(true);

		const stored = await engine.quests.get(quest.id);
		expect(stored?.status).toBe("COMPLETE");
		expect(stored?.hasRequesterAttestation).toBe(true);
		expect(stored?.hasPerformerAttestation).toBe(true);
		expect((await engine.users.get("bob"))?.xp).toBe(100);
	});

	it("rejects a repeated attestation from the same party", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		await engine.service.attestCompletion(quest.id, "alice", 5, null);
		const again = await engine.service.attestCompletion(quest.id, "alice", 5, null);
		expect(again.ok ? null : again.error.message).toBe("Already attested");
	});

	it("forbids attestation from someone outside the quest", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		const result = await engine.service.attestCompletion(quest.id, "mallory", 5, null);
		expect(result.ok ? null : result.error.kind).toBe("forbidden");
	});

	it("validates the rating before touching the store", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		const callsBefore = engine.questStore.calls.length;
		const result = await engine.service.attestCompletion(quest.id, "alice", 6, null);
		expect(result.ok ? null : result.error.message).toBe("rating must be an integer between 1 and 5");
		expect(engine.questStore.calls.length).toBe(callsBefore);
	});

	it("only lets the performer submit work", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		await engine.service.claimQuest(quest.id, "bob");
		const result = await engine.service.submitWork(quest.id, "alice", "Pretending it is done.");
		expect(result.ok ? null : result.error.kind).toBe("forbidden");
	});

	it("opens a dispute on a completed quest", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		await engine.service.attestCompletion(quest.id, "alice", 5, null);
		await engine.service.attestCompletion(quest.id, "bob", 5, null);

		engine.clock.advance(DAY_MS);
		const result = await engine.service.disputeQuest(quest.id, "alice", "  The fence fell over again.  ");
		if (!result.ok) {
			throw result.error;
		}
		expect(result.value.status).toBe("DISPUTED");
		expect(result.value.disputeReason).toBe("The fence fell over again.");
		expect(result.value.disputedBy).toBe("alice");
		expect(result.value.disputedAt).toBe("2024-03-02T12:00:00.000Z");
	});

	it("refuses a dispute after the window has closed", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		await engine.service.attestCompletion(quest.id, "alice", 5, null);
		await engine.service.attestCompletion(quest.id, "bob", 5, null);

		engine.clock.advance(8 * DAY_MS);
		const result = await engine.service.disputeQuest(quest.id, "alice", "The fence fell over again.");
		expect(result.ok ? null : result.error.message).toBe("The dispute window for this quest has closed");
	});

	it("rejects a dispute reason that is too short", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		const result = await engine.service.disputeQuest(quest.id, "alice", "bad");
		expect(result.ok ? null : result.error.message).toBe("reason must be at least 10 characters");
	});

	it("surfaces store outages as TransientStoreError", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		engine.questStore.failNext("get");
		const result = await engine.service.claimQuest(quest.id, "bob");
		expect(result.ok ? null : result.error.kind).toBe("transient_store");
		expect(result.ok ? null : result.error.message).toBe("get: simulated timeout");
	});
});

describe("QuestService creation", () => {
	it("charges the creation cost and stores an OPEN quest", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		expect(quest.status).toBe("OPEN");
		expect(quest.creatorId).toBe("alice");
		expect(quest.performerId).toBeNull();
		expect(quest.createdAt).toBe("2024-03-01T12:00:00.000Z");
		expect(await engine.quests.get(quest.id)).toEqual(quest);
		expect((await engine.users.get("alice"))?.questCreationBalance).toBe(9);
	});

	it("strips markup from the title and description", async () => {
		const engine = buildEngine();
		await engine.service.registerUser("alice");
		const result = await engine.service.createQuest("alice", {
			...sampleDraft,
			title: " <b>Mow the lawn</b> ",
		});
		expect(result.ok ? result.value.title : null).toBe("Mow the lawn");
	});

	it("fails with InsufficientBalance when the creator has no points left", async () => {
		const engine = buildEngine({ service: { initialQuestCreationBalance: 0 } });
		await engine.service.registerUser("alice");
		const result = await engine.service.createQuest("alice", sampleDraft);
		expect(result.ok ? null : result.error.message).toBe("User alice has 0 quest creation points but needs 1.");
	});

	it("requires a registered creator", async () => {
		const engine = buildEngine();
		const result = await engine.service.createQuest("stranger", sampleDraft);
		expect(result.ok ? null : result.error.message).toBe("user stranger was not found.");
	});

	it("rejects rewards above the limit", async () => {
		const engine = buildEngine();
		await engine.service.registerUser("alice");
		const result = await engine.service.createQuest("alice", { ...sampleDraft, rewardXp: 1001 });
		expect(result.ok ? null : result.error.message).toBe("rewardXp must be an integer between 0 and 1000");
	});

	it("refunds the creation cost when the quest write fails", async () => {
		const engine = buildEngine();
		await engine.service.registerUser("alice");
		engine.questStore.failNext("putIfAbsent");
		const result = await engine.service.createQuest("alice", sampleDraft);
		expect(result.ok ? null : result.error.kind).toBe("transient_store");
		expect((await engine.users.get("alice"))?.questCreationBalance).toBe(10);
	});

	it("deletes an OPEN quest for its creator and refunds the cost", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);

		const byOther = await engine.service.deleteQuest(quest.id, "bob");
		expect(byOther.ok ? null : byOther.error.kind).toBe("forbidden");

		const deleted = await engine.service.deleteQuest(quest.id, "alice");
		expect(deleted.ok).toBe(true);
		expect(await engine.quests.get(quest.id)).toBeNull();
		expect((await engine.users.get("alice"))?.questCreationBalance).toBe(10);
	});

	it("keeps claimed quests from being deleted", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);
		await engine.service.claimQuest(quest.id, "bob");
		const result = await engine.service.deleteQuest(quest.id, "alice");
		expect(result.ok ? null : result.error.message).toBe("Only OPEN quests can be deleted. Status: CLAIMED");
	});

	it("reads quests and users back by id", async () => {
		const engine = buildEngine();
		const quest = await openQuest(engine);

		const found = await engine.service.getQuest(quest.id);
		expect(found.ok ? found.value.title : null).toBe("Fix the garden fence");
		const missing = await engine.service.getQuest("nope");
		expect(missing.ok ? null : missing.error.kind).toBe("not_found");

		const bob = await engine.service.getUser("bob");
		expect(bob.ok ? [bob.value.xp, bob.value.questCreationBalance] : null).toEqual([0, 10]);
		const nobody = await engine.service.getUser("nobody");
		expect(nobody.ok ? null : nobody.error.message).toBe("user nobody was not found.");
	});

	it("returns an existing user unchanged on repeated registration", async () => {
		const engine = buildEngine();
		await engine.service.registerUser("alice");
		await engine.service.createQuest("alice", sampleDraft);
		const again = await engine.service.registerUser("alice");
		expect(again.ok ? again.value.questCreationBalance : null).toBe(9);
	});
});

describe("QuestService rewards", () => {
	it("queues the reward when the user store keeps failing and still completes the quest", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		await engine.service.attestCompletion(quest.id, "alice", 5, null);

		engine.userStore.failNext("get", 3);
		const result = await engine.service.attestCompletion(quest.id, "bob", 5, null);
		expect(result.ok ? result.value.status : null).toBe("COMPLETE");
		expect(engine.delays).toEqual([100, 200]);
		expect((await engine.users.get("bob"))?.xp).toBe(0);

		const queued = await engine.failedRewards.get(questRewardId(quest.id));
		expect(queued?.status).toBe("pending");
		expect(queued?.retryCount).toBe(0);
		expect(queued?.userId).toBe("bob");
		expect(queued?.xpAmount).toBe(100);
		expect(queued?.reputationAmount).toBe(10);
		expect(queued?.creationPointsAmount).toBe(2);
		expect(queued?.lastError).toBe("get: simulated timeout");

		const summary = await engine.service.reprocessFailedRewards();
		expect(summary).toEqual({ processed: 1, resolved: 1, abandoned: 0, retried: 0, skipped: 0 });
		expect((await engine.users.get("bob"))?.xp).toBe(100);
		expect((await engine.failedRewards.get(questRewardId(quest.id)))?.status).toBe("resolved");

		const idle = await engine.service.reprocessFailedRewards();
		expect(idle.processed).toBe(0);
		expect((await engine.users.get("bob"))?.xp).toBe(100);
	});

	it("recovers inline when the store fails fewer times than the retry budget", async () => {
		const engine = buildEngine();
		const quest = await submittedQuest(engine);
		await engine.service.attestCompletion(quest.id, "alice", 5, null);

		engine.userStore.failNext("get", 2);
		await engine.service.attestCompletion(quest.id, "bob", 5, null);
		expect(engine.delays).toEqual([100, 200]);
		expect((await engine.users.get("bob"))?.xp).toBe(100);
		expect(await engine.failedRewards.get(questRewardId(quest.id))).toBeNull();
	});

	it("completes without paying when rewards are disabled", async () => {
		const engine = buildEngine({ service: { rewardsEnabled: false } });
		const quest = await submittedQuest(engine);
		await engine.service.attestCompletion(quest.id, "alice", 5, null);
		const result = await engine.service.attestCompletion(quest.id, "bob", 5, null);
		expect(result.ok ? result.value.status : null).toBe("COMPLETE");
		expect((await engine.users.get("bob"))?.xp).toBe(0);
		expect(await engine.failedRewards.get(questRewardId(quest.id))).toBeNull();
	});
});

describe("QuestService expiry sweep", () => {
	it("expires only quests idle past the inactivity window", async () => {
		const engine = buildEngine();
		const stale = await openQuest(engine);

		engine.clock.advance(20 * DAY_MS);
		const fresh = await engine.service.createQuest("alice", sampleDraft);
		if (!fresh.ok) {
			throw fresh.error;
		}
		await engine.service.claimQuest(fresh.value.id, "bob");

		engine.clock.advance(10 * DAY_MS);
		const summary = await engine.service.expireStaleQuests();
		expect(summary).toEqual({ examined: 1, expired: 1 });
		expect((await engine.quests.get(stale.id))?.status).toBe("EXPIRED");
		expect((await engine.quests.get(fresh.value.id))?.status).toBe("CLAIMED");
	});

	it("examines at most one batch per sweep, oldest first", async () => {
		const engine = buildEngine({ service: { sweepBatchSize: 1 } });
		const oldest = await openQuest(engine);
		engine.clock.advance(DAY_MS);
		const younger = await engine.service.createQuest("alice", sampleDraft);
		if (!younger.ok) {
			throw younger.error;
		}

		engine.clock.advance(31 * DAY_MS);
		expect(await engine.service.expireStaleQuests()).toEqual({ examined: 1, expired: 1 });
		expect((await engine.quests.get(oldest.id))?.status).toBe("EXPIRED");
		expect((await engine.quests.get(younger.value.id))?.status).toBe("OPEN");

		expect(await engine.service.expireStaleQuests()).toEqual({ examined: 1, expired: 1 });
		expect((await engine.quests.get(younger.value.id))?.status).toBe("EXPIRED");
		expect(await engine.service.expireStaleQuests()).toEqual({ examined: 0, expired: 0 });
	});
});
