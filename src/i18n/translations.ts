/**
 * Reply text per language. Every table carries the same keys as `pt`; `{name}` placeholders are
 * filled by `t()`. `{p}` is always the guild's command prefix.
 */

export const pt = {
  pong: "🏓 Pong!",
  cmdNoPermission: "❌ Você precisa do cargo de administrador para usar este comando.",
  cmdOwnerOnly: "❌ Apenas o dono do bot pode usar este comando.",
  cmdUnknownSubcommand: "Subcomando desconhecido. Use `{p}{command} help`.",
  cmdFailed: "❌ Algo deu errado ao executar este comando.",
  ytUnavailable: "❌ API do YouTube indisponível (verifique a chave da API ou a cota).",
  stateEnabled: "ativado",
  stateDisabled: "desativado",
  notSet: "não definido",

  cmdHelpGlobalTitle: "**Comandos do bot**",
  cmdHelpPing: "`{p}ping` – verificar se o bot está online",
  cmdHelpHelp: "`{p}help` – ver esta lista",
  cmdHelpVidChoose: "`{p}vidchoose help` – comandos do postador de vídeos",
  cmdHelpPurgeConfig: "`{p}purgeconfig <#canal> <minutos> [countdown]` – limpar um canal periodicamente (dono)",
  cmdHelpStopPurge: "`{p}stoppurge <#canal>` – parar a limpeza automática (dono)",
  cmdHelpSet: "`{p}set help` – configurações do bot",

  cmdHelpVcTitle: "**Comandos VidChoose**",
  cmdHelpVcAddChannel: "• `{p}vc addchannel <url|@handle|id> [peso]` – adicionar um canal e seus vídeos",
  cmdHelpVcAddVideo: "• `{p}vc addvideo <url|id> [peso]` – adicionar um único vídeo",
  cmdHelpVcWeight: "• `{p}vc weight <id|nome> <peso>` – alterar o peso de um canal ou vídeo",
  cmdHelpVcSetChannel: "• `{p}vc setchannel <#canal>` – canal onde os vídeos são postados",
  cmdHelpVcSetInterval: "• `{p}vc setinterval <minutos>` – minutos entre postagens automáticas",
  cmdHelpVcSetHistory: "• `{p}vc sethistory <canais> <vídeos>` – tamanho do histórico de repetição",
  cmdHelpVcList: "• `{p}vc list` – listar canais e pesos",
  cmdHelpVcRemove: "• `{p}vc remove <id|nome|url>` – remover um canal ou vídeo",
  cmdHelpVcForce: "• `{p}vc force` – postar um vídeo agora",
  cmdHelpVcEnable: "• `{p}vc enable` / `{p}vc disable` – ligar ou desligar a postagem automática",
  cmdHelpVcShorts: "• `{p}vc shorts [on|off]` – incluir ou filtrar YouTube Shorts",
  cmdHelpVcStatus: "• `{p}vc status` – configuração atual",
  cmdHelpVcTestWeights: "• `{p}vc testweights [10-1000]` – testar a distribuição dos pesos",
  cmdHelpVcClearHistory: "• `{p}vc clearhistory` – limpar o histórico de postagens",
  cmdHelpVcUpdate: "• `{p}vc update [channelId]` – atualizar a lista de vídeos",
  cmdHelpVcSetApi: "• `{p}vc setapi <chave|clear>` – definir a chave da API do YouTube (dono)",

  cmdHelpSetTitle: "**Configurações**",
  cmdHelpSetAdminRole: "• `{p}set adminrole <@cargo|clear>` – cargo que pode configurar o bot",
  cmdHelpSetLanguage: "• `{p}set language <pt|en>` – idioma do bot neste servidor",
  cmdHelpSetPrefix: "• `{p}set prefix <prefixo>` – prefixo dos comandos neste servidor",

  vcApiKeyUsage: "Uso: `{p}vc setapi <chave>` ou `{p}vc setapi clear`",
  vcApiKeySet: "✅ Chave da API do YouTube definida.",
  vcApiKeyCleared: "✅ Chave da API do YouTube removida. Usando a chave do ambiente, se houver.",
  vcInvalidWeight: "❌ O peso deve ser um número maior ou igual a 0.",
  vcAddChannelUsage: "Uso: `{p}vc addchannel <url|@handle|id> [peso]`",
  vcChannelUnrecognized: "❌ Não consegui extrair um ID de canal disso.",
  vcChannelNotFound: "❌ Canal não encontrado.",
  vcNoVideos: "❌ Nenhum vídeo encontrado no canal (ou todos são shorts e os shorts estão desativados).",
  vcChannelAdded: "✅ Canal **{name}** adicionado com {count} vídeos (peso {weight}, ID `{id}`).",
  vcAddVideoUsage: "Uso: `{p}vc addvideo <url|id> [peso]`",
  vcVideoUnrecognized: "❌ Não consegui extrair um ID de vídeo disso.",
  vcVideoNotFound: "❌ Vídeo não encontrado.",
  vcVideoAdded: "✅ Vídeo **{title}** de {channel} adicionado (peso {weight}).",
  vcWeightUsage: "Uso: `{p}vc weight <id|nome> <peso>`",
  vcWeightSet: "✅ Peso de **{name}** definido para **{weight}**.",
  vcEntryNotFound: "❌ Canal/vídeo não encontrado.",
  vcSetChannelUsage: "Uso: `{p}vc setchannel <#canal>`",
  vcTextChannelNotFound: "❌ Canal de texto não encontrado.",
  vcPostChannelSet: "✅ Os vídeos serão postados em <#{channel}>.",
  vcIntervalInvalid: "❌ O intervalo deve ser de pelo menos 1 minuto.",
  vcIntervalSet: "✅ Intervalo de postagem definido para {minutes} minutos.",
  vcHistoryInvalid: "❌ Os tamanhos do histórico devem ser pelo menos 1.",
  vcHistorySet: "✅ Histórico: {channels} canais, {videos} vídeos.",
  vcListEmpty: "Nenhum canal adicionado ainda.",
  vcListHeader: "**Canais de vídeo:**",
  vcListChannel: "• Canal: **{name}** – peso {weight} | vídeos {count}",
  vcListVideo: "• Vídeo: **{name}** – peso {weight}",
  vcRemoveUsage: "Uso: `{p}vc remove <id|nome|url>`",
  vcRemoved: "✅ **{name}** removido.",
  vcNoPostChannel: "❌ Nenhum canal de postagem definido. Use `{p}vc setchannel`.",
  vcNoCandidates: "❌ Nenhum canal ou vídeo disponível.",
  vcPostChannelUnavailable: "❌ O canal de postagem não existe mais ou não posso escrever nele.",
  vcPosted: "✅ Vídeo postado!",
  vcEnabled: "✅ Postagem automática ativada.",
  vcDisabled: "✅ Postagem automática desativada.",
  vcShortsOn: "✅ YouTube Shorts agora estão **ativados** e entram na seleção.",
  vcShortsOff: "✅ YouTube Shorts agora estão **desativados** e serão filtrados.",
  vcShortsStatus: "YouTube Shorts estão **{state}**. Use `{p}vc shorts on|off`.",
  vcStatusTitle: "**Status do VidChoose**",
  vcStatusPostChannel: "Canal de postagem: {value}",
  vcStatusInterval: "Intervalo: {minutes} min",
  vcStatusAuto: "Postagem automática: {state}",
  vcStatusHistory: "Histórico: {channels} canais, {videos} vídeos",
  vcStatusShorts: "YouTube Shorts: {state}",
  vcStatusTotals: "Total de canais: {channels} | total de vídeos: {videos}",
  vcStatusNextPost: "Próxima postagem: {time}",
  vcTrialsInvalid: "❌ O número de testes deve estar entre 10 e 1000.",
  vcNoChannels: "Nenhum canal configurado.",
  vcTestHeader: "**Resultado do teste de pesos** ({trials} testes)",
  vcTestLine: "• **{name}**: {percent}% (peso {weight})",
  vcHistoryCleared: "✅ Histórico limpo.",
  vcNothingToUpdate: "Nenhum canal para atualizar.",
  vcUpdated: "✅ {updated} canal(is) atualizado(s), falhas: {failed}.",

  pcUsage: "Uso: `{p}purgeconfig <#canal> <minutos> [countdown]`",
  pcIntervalInvalid: "❌ O intervalo deve ser de pelo menos 1 minuto.",
  pcMissingPermission: "❌ Preciso de Gerenciar Mensagens e Ler Histórico em <#{channel}>.",
  pcConfigured: "✅ Limpeza automática de <#{channel}> a cada {minutes} minutos.",
  pcConfiguredCountdown: "✅ Limpeza automática de <#{channel}> a cada {minutes} minutos, com contagem regressiva.",
  pcListEmpty: "Nenhum canal com limpeza automática.",
  pcListHeader: "**Canais com limpeza automática:**",
  pcListLine: "• <#{channel}>: a cada {minutes} min",
  pcListLineCountdown: "• <#{channel}>: a cada {minutes} min, com contagem regressiva",
  spUsage: "Uso: `{p}stoppurge <#canal>`",
  spStopped: "✅ Limpeza automática parada em <#{channel}>.",
  spNotConfigured: "Não havia limpeza automática em <#{channel}>.",
  purgeCountdown: "🧹 Este canal será limpo em **{time}**.",

  setUsage: "Uso: `{p}set adminrole|language|prefix ...`",
  setRoleNotFound: "❌ Cargo não encontrado.",
  adminRoleSet: "✅ Cargo de administrador definido: **{role}**",
  adminRoleCleared: "✅ Requisito de cargo de administrador removido. Todos podem configurar o bot.",
  adminRoleCurrent: "Cargo de administrador atual: <@&{role}>",
  adminRoleNone: "Nenhum cargo de administrador configurado. Todos podem configurar o bot.",
  languageSet: "✅ Idioma do bot definido para: **{language}**",
  languageCurrent: "Idioma atual: **{language}**",
  languageInvalid: "❌ Idioma inválido. Use: `pt` ou `en`",
  prefixSet: "✅ Prefixo dos comandos definido para `{prefix}`",
  prefixCurrent: "Prefixo atual: `{prefix}`",
  prefixInvalidLength: "❌ Prefixo inválido. Deve ter de 1 a 3 caracteres.",
  prefixInvalidSpaces: "❌ Prefixo inválido. Espaços não são permitidos.",
  prefixInvalidReserved: "❌ Prefixo inválido. `#` e `@` não são permitidos.",
  prefixInvalidSpecial: "❌ Prefixo inválido. Pelo menos um caractere deve ser especial.",
} as const;

export const en = {
  pong: "🏓 Pong!",
  cmdNoPermission: "❌ You need the admin role to use this command.",
  cmdOwnerOnly: "❌ Only the bot owner can use this command.",
  cmdUnknownSubcommand: "Unknown subcommand. Use `{p}{command} help`.",
  cmdFailed: "❌ Something went wrong while running that command.",
  ytUnavailable: "❌ YouTube API unavailable (check the API key or quota).",
  stateEnabled: "enabled",
  stateDisabled: "disabled",
  notSet: "not set",

  cmdHelpGlobalTitle: "**Bot commands**",
  cmdHelpPing: "`{p}ping` – check that the bot is online",
  cmdHelpHelp: "`{p}help` – show this list",
  cmdHelpVidChoose: "`{p}vidchoose help` – video poster commands",
  cmdHelpPurgeConfig: "`{p}purgeconfig <#channel> <minutes> [countdown]` – clear a channel periodically (owner)",
  cmdHelpStopPurge: "`{p}stoppurge <#channel>` – stop automatic clearing (owner)",
  cmdHelpSet: "`{p}set help` – bot settings",

  cmdHelpVcTitle: "**VidChoose commands**",
  cmdHelpVcAddChannel: "• `{p}vc addchannel <url|@handle|id> [weight]` – add a channel and its videos",
  cmdHelpVcAddVideo: "• `{p}vc addvideo <url|id> [weight]` – add a single video",
  cmdHelpVcWeight: "• `{p}vc weight <id|name> <weight>` – change a channel's or video's weight",
  cmdHelpVcSetChannel: "• `{p}vc setchannel <#channel>` – where videos are posted",
  cmdHelpVcSetInterval: "• `{p}vc setinterval <minutes>` – minutes between automatic posts",
  cmdHelpVcSetHistory: "• `{p}vc sethistory <channels> <videos>` – how many recent picks to avoid",
  cmdHelpVcList: "• `{p}vc list` – list channels and weights",
  cmdHelpVcRemove: "• `{p}vc remove <id|name|url>` – remove a channel or video",
  cmdHelpVcForce: "• `{p}vc force` – post a video now",
  cmdHelpVcEnable: "• `{p}vc enable` / `{p}vc disable` – turn automatic posting on or off",
  cmdHelpVcShorts: "• `{p}vc shorts [on|off]` – include or filter out YouTube Shorts",
  cmdHelpVcStatus: "• `{p}vc status` – current configuration",
  cmdHelpVcTestWeights: "• `{p}vc testweights [10-1000]` – test the weight distribution",
  cmdHelpVcClearHistory: "• `{p}vc clearhistory` – clear the posting history",
  cmdHelpVcUpdate: "• `{p}vc update [channelId]` – refresh video lists",
  cmdHelpVcSetApi: "• `{p}vc setapi <key|clear>` – set the YouTube API key (owner)",

  cmdHelpSetTitle: "**Settings**",
  cmdHelpSetAdminRole: "• `{p}set adminrole <@role|clear>` – role allowed to configure the bot",
  cmdHelpSetLanguage: "• `{p}set language <pt|en>` – bot language in this server",
  cmdHelpSetPrefix: "• `{p}set prefix <prefix>` – command prefix in this server",

  vcApiKeyUsage: "Usage: `{p}vc setapi <key>` or `{p}vc setapi clear`",
  vcApiKeySet: "✅ YouTube API key set.",
  vcApiKeyCleared: "✅ YouTube API key cleared. Using the environment key, if any.",
  vcInvalidWeight: "❌ Weight must be a number of 0 or more.",
  vcAddChannelUsage: "Usage: `{p}vc addchannel <url|@handle|id> [weight]`",
  vcChannelUnrecognized: "❌ Could not extract a channel ID from that.",
  vcChannelNotFound: "❌ Channel not found.",
  vcNoVideos: "❌ No videos found in channel (or all videos are shorts and shorts are disabled).",
  vcChannelAdded: "✅ Added channel **{name}** with {count} videos (weight {weight}, ID `{id}`).",
  vcAddVideoUsage: "Usage: `{p}vc addvideo <url|id> [weight]`",
  vcVideoUnrecognized: "❌ Could not extract a video ID from that.",
  vcVideoNotFound: "❌ Video not found.",
  vcVideoAdded: "✅ Added video **{title}** from {channel} (weight {weight}).",
  vcWeightUsage: "Usage: `{p}vc weight <id|name> <weight>`",
  vcWeightSet: "✅ Set weight for **{name}** to **{weight}**.",
  vcEntryNotFound: "❌ Channel/video not found.",
  vcSetChannelUsage: "Usage: `{p}vc setchannel <#channel>`",
  vcTextChannelNotFound: "❌ Text channel not found.",
  vcPostChannelSet: "✅ Videos will be posted in <#{channel}>.",
  vcIntervalInvalid: "❌ Interval must be at least 1 minute.",
  vcIntervalSet: "✅ Post interval set to {minutes} minutes.",
  vcHistoryInvalid: "❌ History sizes must be at least 1.",
  vcHistorySet: "✅ History: {channels} channels, {videos} videos.",
  vcListEmpty: "No channels added yet.",
  vcListHeader: "**Video channels:**",
  vcListChannel: "• Channel: **{name}** – weight {weight} | videos {count}",
  vcListVideo: "• Video: **{name}** – weight {weight}",
  vcRemoveUsage: "Usage: `{p}vc remove <id|name|url>`",
  vcRemoved: "✅ Removed **{name}**.",
  vcNoPostChannel: "❌ No posting channel set. Use `{p}vc setchannel`.",
  vcNoCandidates: "❌ No channels or videos available.",
  vcPostChannelUnavailable: "❌ The posting channel is gone or I cannot write there.",
  vcPosted: "✅ Video posted!",
  vcEnabled: "✅ Automatic posting enabled.",
  vcDisabled: "✅ Automatic posting disabled.",
  vcShortsOn: "✅ YouTube Shorts are now **enabled** and will be included in video selection.",
  vcShortsOff: "✅ YouTube Shorts are now **disabled** and will be filtered out.",
  vcShortsStatus: "YouTube Shorts are **{state}**. Use `{p}vc shorts on|off`.",
  vcStatusTitle: "**VidChoose status**",
  vcStatusPostChannel: "Posting channel: {value}",
  vcStatusInterval: "Post interval: {minutes} min",
  vcStatusAuto: "Auto posting: {state}",
  vcStatusHistory: "History: {channels} channels, {videos} videos",
  vcStatusShorts: "YouTube Shorts: {state}",
  vcStatusTotals: "Total channels: {channels} | total videos: {videos}",
  vcStatusNextPost: "Next post: {time}",
  vcTrialsInvalid: "❌ Trials must be between 10 and 1000.",
  vcNoChannels: "No channels configured.",
  vcTestHeader: "**Weight test results** ({trials} trials)",
  vcTestLine: "• **{name}**: {percent}% (weight {weight})",
  vcHistoryCleared: "✅ History cleared.",
  vcNothingToUpdate: "No channels to update.",
  vcUpdated: "✅ Updated {updated} channel(s), failed: {failed}.",

  pcUsage: "Usage: `{p}purgeconfig <#channel> <minutes> [countdown]`",
  pcIntervalInvalid: "❌ Interval must be at least 1 minute.",
  pcMissingPermission: "❌ I need Manage Messages and Read Message History in <#{channel}>.",
  pcConfigured: "✅ Auto-purge set for <#{channel}> every {minutes} minutes.",
  pcConfiguredCountdown: "✅ Auto-purge set for <#{channel}> every {minutes} minutes, with a countdown.",
  pcListEmpty: "No channels have auto-purge configured.",
  pcListHeader: "**Auto-purge channels:**",
  pcListLine: "• <#{channel}>: every {minutes} min",
  pcListLineCountdown: "• <#{channel}>: every {minutes} min, with countdown",
  spUsage: "Usage: `{p}stoppurge <#channel>`",
  spStopped: "✅ Auto-purge stopped for <#{channel}>.",
  spNotConfigured: "Auto-purge was not configured for <#{channel}>.",
  purgeCountdown: "🧹 This channel will be cleared in **{time}**.",

  setUsage: "Usage: `{p}set adminrole|language|prefix ...`",
  setRoleNotFound: "❌ Role not found.",
  adminRoleSet: "✅ Admin role set: **{role}**",
  adminRoleCleared: "✅ Admin role requirement removed. Everyone can configure the bot.",
  adminRoleCurrent: "Current admin role: <@&{role}>",
  adminRoleNone: "No admin role configured. Everyone can configure the bot.",
  languageSet: "✅ Bot language set to: **{language}**",
  languageCurrent: "Current language: **{language}**",
  languageInvalid: "❌ Invalid language. Use: `pt` or `en`",
  prefixSet: "✅ Command prefix set to `{prefix}`",
  prefixCurrent: "Current prefix: `{prefix}`",
  prefixInvalidLength: "❌ Invalid prefix. It must be 1 to 3 characters.",
  prefixInvalidSpaces: "❌ Invalid prefix. Spaces are not allowed.",
  prefixInvalidReserved: "❌ Invalid prefix. `#` and `@` are not allowed.",
  prefixInvalidSpecial: "❌ Invalid prefix. At least one character must be special.",
} as const;

export type TranslationKey = keyof typeof pt;
