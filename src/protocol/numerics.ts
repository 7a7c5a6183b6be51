/**
 * Numeric replies used by the conformance suites (RFC 2812 section 5).
 */
export const NUMERICS = {
  RPL_WELCOME: '001',
  RPL_UMODEIS: '221',
  RPL_CHANNELMODEIS: '324',
  RPL_NOTOPIC: '331',
  RPL_TOPIC: '332',
  RPL_INVITING: '341',
  RPL_NAMREPLY: '353',
  RPL_ENDOFNAMES: '366',
  ERR_NOSUCHNICK: '401',
  ERR_NOSUCHCHANNEL: '403',
  ERR_CANNOTSENDTOCHAN: '404',
  ERR_NOORIGIN: '409',
  ERR_NORECIPIENT: '411',
  ERR_NOTEXTTOSEND: '412',
  ERR_UNKNOWNCOMMAND: '421',
  ERR_NONICKNAMEGIVEN: '431',
  ERR_ERRONEUSNICKNAME: '432',
  ERR_NICKNAMEINUSE: '433',
  ERR_NICKCOLLISION: '436',
  ERR_USERNOTINCHANNEL: '441',
  ERR_NOTONCHANNEL: '442',
  ERR_USERONCHANNEL: '443',
  ERR_NOTREGISTERED: '451',
  ERR_NEEDMOREPARAMS: '461',
  ERR_ALREADYREGISTRED: '462',
  ERR_PASSWDMISMATCH: '464',
  ERR_YOUREBANNEDCREEP: '465',
  ERR_CHANNELISFULL: '471',
  ERR_UNKNOWNMODE: '472',
  ERR_INVITEONLYCHAN: '473',
  ERR_BANNEDFROMCHAN: '474',
  ERR_BADCHANNELKEY: '475',
  ERR_CHANOPRIVSNEEDED: '482',
  ERR_USERSDONTMATCH: '502',
} as const;

export type NumericName = keyof typeof NUMERICS;
export type NumericCode = (typeof NUMERICS)[NumericName];

/** Replies that end a registration attempt without a welcome */
export const REGISTRATION_FAILURES: readonly string[] = [
  NUMERICS.ERR_ERRONEUSNICKNAME,
  NUMERICS.ERR_NICKNAMEINUSE,
  NUMERICS.ERR_NICKCOLLISION,
  NUMERICS.ERR_ALREADYREGISTRED,
  NUMERICS.ERR_PASSWDMISMATCH,
  NUMERICS.ERR_YOUREBANNEDCREEP,
];

/** Replies a server sends instead of completing a JOIN */
export const JOIN_REJECTIONS: readonly string[] = [
  NUMERICS.ERR_CHANNELISFULL,
  NUMERICS.ERR_INVITEONLYCHAN,
  NUMERICS.ERR_BANNEDFROMCHAN,
  NUMERICS.ERR_BADCHANNELKEY,
];

const NAMES_BY_CODE = new Map<string, string>(
  Object.entries(NUMERICS).map(([name, code]) => [code, name])
);

/**
 * Symbolic name of a numeric, e.g. '482' -> 'ERR_CHANOPRIVSNEEDED'.
 */
export function numericName(code: string): string | undefined {
  return NAMES_BY_CODE.get(code);
}
