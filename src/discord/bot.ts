import { Client, Events, GatewayIntentBits, REST, Routes, SlashCommandBuilder } from 'discord.js';
import { DBContext } from '../db/client.js';
import { getSettings, parseSetting, updateSettings } from '../db/settings.js';
import { KnowledgeBase } from '../service.js';

const REPLY_LIMIT = 1900;

const commands = [
  new SlashCommandBuilder()
    .setName('askkb')
    .setDescription('Ask the college knowledge base')
    .addStringOption((o) => o.setName('question').setDescription('Question').setRequired(true)),
  new SlashCommandBuilder()
    .setName('kbconfig')
    .setDescription('Show or update retrieval settings')
    .addStringOption((o) =>
      o
        .setName('action')
        .setDescription('Action')
        .setRequired(true)
        .addChoices(
          { name: 'show', value: 'show' },
          { name: 'anchoring-on', value: 'anchoring-on' },
          { name: 'anchoring-off', value: 'anchoring-off' }
        )
    )
].map((c) => c.toJSON());

export function formatSettings(ctx: DBContext): string {
  const s = getSettings(ctx);
  return [
    'KB settings:',
    `- anchoringEnabled: ${s.anchoringEnabled}`,
    `- relevanceThreshold: ${s.relevanceThreshold}`,
    `- topK: ${s.topK}`
  ].join('\n');
}

export function applyKbTextCommand(ctx: DBContext, content: string): string | null {
  const trimmed = content.trim();
  if (trimmed === '!kb settings') return formatSettings(ctx);
  if (trimmed === '!kb anchoring on') {
    updateSettings(ctx, { anchoringEnabled: true });
    return '✅ Query anchoring enabled';
  }
  if (trimmed === '!kb anchoring off') {
    updateSettings(ctx, { anchoringEnabled: false });
    return '✅ Query anchoring disabled';
  }
  if (trimmed.startsWith('!kb threshold ')) {
    const parsed = parseSetting('relevanceThreshold', trimmed.slice('!kb threshold '.length));
    if (!parsed.ok) return `⚠️ ${parsed.error}`;
    const next = updateSettings(ctx, parsed.patch);
    return `✅ Relevance threshold set to ${next.relevanceThreshold}`;
  }
  if (trimmed.startsWith('!kb topk ')) {
    const parsed = parseSetting('topK', trimmed.slice('!kb topk '.length));
    if (!parsed.ok) return `⚠️ ${parsed.error}`;
    const next = updateSettings(ctx, parsed.patch);
    return `✅ Top-k set to ${next.topK}`;
  }
  return null;
}

export async function registerCommands(): Promise<void> {
  const token = process.env.DISCORD_BOT_TOKEN;
  const clientId = process.env.DISCORD_CLIENT_ID;
  const guildId = process.env.DISCORD_GUILD_ID;
  if (!token || !clientId || !guildId) return;

  const rest = new REST({ version: '10' }).setToken(token);
  await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: commands });
}

export async function startDiscordBot(ctx: DBContext, kb: KnowledgeBase): Promise<void> {
  const token = process.env.DISCORD_BOT_TOKEN;
  if (!token) {
    console.error('DISCORD_BOT_TOKEN is not set; the bot was not started.');
    return;
  }

  const client = new Client({ intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent] });

  client.once(Events.ClientReady, (c) => {
    console.log(`Discord bot ready as ${c.user.tag}`);
  });

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    if (interaction.commandName === 'askkb') {
      const question = interaction.options.getString('question', true);
      await interaction.deferReply();
      const answer = await kb.queryKnowledgeBase(question);
      await interaction.editReply(answer.slice(0, REPLY_LIMIT));
    }

    if (interaction.commandName === 'kbconfig') {
      const action = interaction.options.getString('action', true);
      if (action === 'show') {
        await interaction.reply(formatSettings(ctx));
      } else if (action === 'anchoring-on') {
        updateSettings(ctx, { anchoringEnabled: true });
        await interaction.reply('✅ Query anchoring enabled');
      } else if (action === 'anchoring-off') {
        updateSettings(ctx, { anchoringEnabled: false });
        await interaction.reply('✅ Query anchoring disabled');
      }
    }
  });

  client.on(Events.MessageCreate, async (msg) => {
    if (msg.author.bot) return;
    const content = msg.content.trim();

    if (content.startsWith('!askkb ')) {
      const question = content.replace('!askkb ', '').trim();
      const answer = await kb.queryKnowledgeBase(question);
      await msg.reply(answer.slice(0, REPLY_LIMIT));
    }

    if (content.startsWith('!kb ')) {
      const result = applyKbTextCommand(ctx, content);
      if (result) await msg.reply(result);
    }
  });

  await client.login(token);
}
