/**
 * Public surface of the engagement module.
 */
export * from "./errors";
export * from "./ids";
export * from "./engine";
export * from "./init";
export * from "./repositories";

export * from "./users/types";
export * from "./users/streak";
export * from "./users/repository";
export * from "./users/repository.memory";
export * from "./users/service";

export * from "./ledger/types";
export * from "./ledger/ranks";
export * from "./ledger/policy";
export * from "./ledger/repository";
export * from "./ledger/repository.memory";
export * from "./ledger/service";

export * from "./memes/types";
export * from "./memes/repository";
export * from "./memes/repository.memory";
export * from "./memes/service";

export * from "./interactions/types";
export * from "./interactions/thread";
export * from "./interactions/repository";
export * from "./interactions/repository.memory";
export * from "./interactions/service";

export * from "./badges/types";
export * from "./badges/criteria";
export * from "./badges/catalog";
export * from "./badges/repository";
export * from "./badges/repository.memory";
export * from "./badges/service";

export * from "./leaderboard/types";
export * from "./leaderboard/scoring";
export * from "./leaderboard/repository";
export * from "./leaderboard/repository.memory";
export * from "./leaderboard/trending";
export * from "./leaderboard/refresh";
export * from "./leaderboard/service";

export * from "./activity/types";
export * from "./activity/format";
export * from "./activity/repository";
export * from "./activity/repository.memory";
export * from "./activity/service";

export * from "./daily/service";
