export const PROJECT_NAME = "trello-mcp";
export const TRELLO_BASE_URL = "https://api.trello.com/1";
