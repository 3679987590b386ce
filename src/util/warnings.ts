const customStore = `
===================================================================================================
⚠️  WARNING: selected custom task store! ⚠️
===================================================================================================
You selected to manage your own task store, it means snapshot persistence (load, save) is your
responsibility. Every save must replace the whole snapshot atomically: a reader must never observe
a partially written snapshot as the current one, or tasks will be lost on restart.
===================================================================================================
`;

const executorWithoutValidation = `
===================================================================================================
⚠️  WARNING: "$1" upload executor registered without media validation! ⚠️
===================================================================================================
Tasks for "$1" are only checked for a known video extension when they are added.
Files the platform rejects will burn their retry budget before they are marked as failed.
===================================================================================================
`;

export const warnings = {
  customStore,
  executorWithoutValidation,
};
