import { Bot } from "grammy";

import type { FailedRewardRecord, RewardGrant } from "../types/reward";

/** Channel for conditions that need an operator; delivery failures are logged, never thrown. */
export interface OperatorNotifier {
	notifyAbandonedReward(record: FailedRewardRecord): Promise<void>;
	/** A reward that could neither be applied nor queued for reprocessing. */
	notifyLostReward(grant: RewardGrant, reason: string): Promise<void>;
}

export function formatAbandonedReward(record: FailedRewardRecord): string {
	return [
		"Reward abandoned after retries",
		`reward: ${record.id}`,
		`quest: ${record.questId}`,
		`user: ${record.userId}`,
		`xp: ${record.xpAmount}, reputation: ${record.reputationAmount}, creation points: ${record.creationPointsAmount}`,
		`retries: ${record.retryCount}`,
		`last error: ${record.lastError ?? "unknown"}`,
	].join("\n");
}

export function formatLostReward(grant: RewardGrant, reason: string): string {
	return [
		"Reward lost: not applied and not queued",
		`reward: ${grant.rewardId}`,
		`quest: ${grant.questId}`,
		`user: ${grant.userId}`,
		`xp: ${grant.xpAmount}, reputation: ${grant.reputationAmount}, creation points: ${grant.creationPointsAmount}`,
		`error: ${reason}`,
	].join("\n");
}

export class LoggingOperatorNotifier implements OperatorNotifier {
	async notifyAbandonedReward(record: FailedRewardRecord): Promise<void> {
		console.error(`[operator] ${formatAbandonedReward(record)}`);
	}

	async notifyLostReward(grant: RewardGrant, reason: string): Promise<void> {
		console.error(`[operator] ${formatLostReward(grant, reason)}`);
	}
}

export class TelegramOperatorNotifier implements OperatorNotifier {
	private readonly bot: Bot;

	constructor(botToken: string, private readonly chatId: string) {
		if (!botToken) {
			throw new Error("OPERATOR_BOT_TOKEN is required to initialise TelegramOperatorNotifier");
		}
		if (!chatId) {
			throw new Error("OPERATOR_CHAT_ID is required to initialise TelegramOperatorNotifier");
		}
		this.bot = new Bot(botToken);
	}

	async notifyAbandonedReward(record: FailedRewardRecord): Promise<void> {
		await this.safeSendMessage(formatAbandonedReward(record));
	}

	async notifyLostReward(grant: RewardGrant, reason: string): Promise<void> {
		await this.safeSendMessage(formatLostReward(grant, reason));
	}

	private async safeSendMessage(text: string): Promise<void> {
		try {
			await this.bot.api.sendMessage(this.chatId, text, { link_preview_options: { is_disabled: true } });
		} catch (error) {
			console.error("[operatorNotifier] Failed to send message", {
				chatId: this.chatId,
				text,
				error,
			});
		}
	}
}

export function createOperatorNotifier(config: { botToken: string; chatId: string }): OperatorNotifier {
	if (config.botToken && config.chatId) {
		return new TelegramOperatorNotifier(config.botToken, config.chatId);
	}
	return new LoggingOperatorNotifier();
}
