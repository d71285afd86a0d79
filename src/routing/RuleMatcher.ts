/**
 * @file Rule Matcher
 *
 * Deterministic intent resolution from keyword patterns. This is the
 * fallback when the generative parser is unavailable or keeps failing,
 * and the dangerous-operation detector shared with the safety escalator.
 *
 * `match` is total and pure: the same text always yields the same Intent,
 * and no input makes it throw.
 *
 * @module routing/RuleMatcher
 */

import type {
    ControlAppSlots,
    Intent,
    PlayMusicSlots,
    SystemSettingSlots,
    WebSearchSlots,
    WriteNoteSlots
} from '../command/types.js';
import { clarify_create } from '../command/schemas.js';
import type { IntentRule, RoutableIntentName, RuleTable } from './rules.js';

export const REASON_DANGEROUS: string = 'dangerous operation detected';
export const REASON_NO_MATCH: string = 'no matching intent';
export const ACK_NO_MATCH: string = '抱歉，我不太理解您的意思，能具体说说吗？';

const ACK_PREFIX: string = '好的，';
const NOTE_TITLE_LENGTH: number = 20;

/**
 * Router for keyword-driven intent classification.
 */
export class RuleMatcher {
    constructor(private readonly table: RuleTable) {}

    /**
     * Classify an utterance. Never fails: unmatched input becomes `clarify`.
     *
     * @param text - Raw utterance.
     * @returns The matched intent.
     */
    public match(text: string): Intent {
        const utterance: string = text.trim();

        if (this.dangerous_detect(utterance)) {
            return clarify_create(
                `您确定要执行「${utterance}」吗？这可能有风险。`,
                { risk: 'high', reason: REASON_DANGEROUS }
            );
        }

        const rule: IntentRule | undefined = this.rule_find(utterance);
        if (!rule) {
            return clarify_create(ACK_NO_MATCH, { risk: 'low', reason: REASON_NO_MATCH });
        }

        return this.intent_build(rule.name, utterance);
    }

    /**
     * Whether the text contains any dangerous-operation keyword.
     */
    public dangerous_detect(text: string): boolean {
        const lower: string = text.toLowerCase();
        return this.table.dangerous.some((pattern: RegExp): boolean => pattern.test(lower));
    }

    /**
     * First-match-wins lookup over the ordered table.
     */
    private rule_find(text: string): IntentRule | undefined {
        const lower: string = text.toLowerCase();
        return this.table.intents.find((rule: IntentRule): boolean =>
            rule.patterns.some((pattern: RegExp): boolean => pattern.test(lower)));
    }

    private intent_build(name: RoutableIntentName, text: string): Intent {
        const safety = { risk: 'low', reason: '' } as const;

        switch (name) {
            case 'system_setting': {
                const slots: SystemSettingSlots = this.slots_systemSetting(text);
                return { name, slots, requiresConfirmation: false, spokenAcknowledgement: ACK_PREFIX + this.ack_systemSetting(slots), safety };
            }
            case 'play_music': {
                const slots: PlayMusicSlots = this.slots_playMusic(text);
                return { name, slots, requiresConfirmation: false, spokenAcknowledgement: ACK_PREFIX + this.ack_playMusic(slots), safety };
            }
            case 'web_search': {
                const slots: WebSearchSlots = this.slots_webSearch(text);
                return { name, slots, requiresConfirmation: false, spokenAcknowledgement: `${ACK_PREFIX}搜索${slots.query}`, safety };
            }
            case 'write_note': {
                const slots: WriteNoteSlots = this.slots_writeNote(text);
                return { name, slots, requiresConfirmation: false, spokenAcknowledgement: `${ACK_PREFIX}创建笔记`, safety };
            }
            case 'control_app': {
                const slots: ControlAppSlots = this.slots_controlApp(text);
                return { name, slots, requiresConfirmation: false, spokenAcknowledgement: ACK_PREFIX + this.ack_controlApp(slots), safety };
            }
        }
    }

    // ─── Slot extraction ─────────────────────────────────────────────────────

    private slots_systemSetting(text: string): SystemSettingSlots {
        let setting: string = 'volume';
        let keyword: RegExp = /(?:音量|声音|volume).*?(\d+)/i;

        if (/亮度|brightness/i.test(text)) {
            setting = 'brightness';
            keyword = /(?:亮度|brightness).*?(\d+)/i;
        } else if (/静音|mute/i.test(text)) {
            return { setting: 'mute' };
        } else if (/截图|screenshot/i.test(text)) {
            return { setting: 'screenshot' };
        }

        const percentMatch: RegExpMatchArray | null = text.match(/(\d+)\s*%/);
        const keywordMatch: RegExpMatchArray | null = percentMatch ? null : text.match(keyword);
        const digits: string | undefined = percentMatch?.[1] ?? keywordMatch?.[1];

        return digits !== undefined
            ? { setting, value: Number.parseInt(digits, 10) }
            : { setting };
    }

    private slots_playMusic(text: string): PlayMusicSlots {
        if (/暂停|pause/i.test(text)) return { action: 'pause' };
        if (/下一首|next/i.test(text)) return { action: 'next' };
        if (/上一首|previous/i.test(text)) return { action: 'previous' };
        return { action: 'play' };
    }

    private slots_webSearch(text: string): WebSearchSlots {
        const match: RegExpMatchArray | null = text.match(/(?:搜索|查找|找一下|查一下|search|google|百度)\s*(.+)/i);
        const query: string = (match?.[1] ?? '')
            .replace(/^(?:一下|for)\s*/i, '')
            .trim();
        return { query: query.length > 0 ? query : text };
    }

    private slots_writeNote(text: string): WriteNoteSlots {
        const match: RegExpMatchArray | null = text.match(/(?:记录|笔记|note)\s*[:：]?\s*(.+)/i);
        const content: string = (match?.[1] ?? '').trim();
        if (content.length === 0) {
            return { title: 'Quick Note', body: text };
        }
        return {
            title: Array.from(content).slice(0, NOTE_TITLE_LENGTH).join(''),
            body: content
        };
    }

    private slots_controlApp(text: string): ControlAppSlots {
        const openMatch: RegExpMatchArray | null =
            text.match(/(?:打开|启动)\s*([\p{L}\p{N}_.-]+)/u) ?? text.match(/\bopen\s+([\w.-]+)/i);
        if (openMatch) {
            return { app: this.appName_clean(openMatch[1]), action: 'open' };
        }

        const quitMatch: RegExpMatchArray | null =
            text.match(/(?:关闭|退出)\s*([\p{L}\p{N}_.-]+)/u) ?? text.match(/\bquit\s+([\w.-]+)/i);
        if (quitMatch) {
            return { app: this.appName_clean(quitMatch[1]), action: 'quit' };
        }

        const known: RegExpMatchArray | null = text.match(/safari|chrome|微信|wechat/i);
        return known ? { app: known[0], action: 'open' } : {};
    }

    private appName_clean(raw: string): string {
        const cleaned: string = raw.replace(/(?:应用|app)$/i, '').trim();
        return cleaned.length > 0 ? cleaned : raw;
    }

    // ─── Acknowledgements ────────────────────────────────────────────────────

    private ack_systemSetting(slots: SystemSettingSlots): string {
        switch (slots.setting) {
            case 'volume':
                return slots.value !== undefined ? `把音量调到${slots.value}%` : '调整音量';
            case 'brightness':
                return slots.value !== undefined ? `把亮度调到${slots.value}%` : '调整亮度';
            case 'mute':
                return '静音';
            case 'screenshot':
                return '截图';
            default:
                return '执行操作';
        }
    }

    private ack_playMusic(slots: PlayMusicSlots): string {
        switch (slots.action) {
            case 'pause': return '暂停播放';
            case 'next': return '播放下一首';
            case 'previous': return '播放上一首';
            default: return '播放音乐';
        }
    }

    private ack_controlApp(slots: ControlAppSlots): string {
        const verb: string = slots.action === 'quit' ? '关闭' : '打开';
        return `${verb}${slots.app ?? '应用'}`;
    }
}
