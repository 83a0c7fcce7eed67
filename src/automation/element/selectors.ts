import { withText } from "../../utils/selectors";

const button = (label: string) => withText("div[role='button']", label);

export const REGISTER = {
  CREATE_ACCOUNT: withText("a", "Create account"),
  EDIT_HOMESERVER: button("Edit"),
  HOMESERVER: "input[id='homeserver']",
  CONTINUE: button("Continue"),
  USERNAME: "input[id='username']",
  PASSWORD: "input[id='password']",
  PASSWORD_CONFIRM: "input[id='passwordConfirm']",
  SUBMIT: button("Register"),
} as const;

export const CHAT = {
  START_CHAT: "div[aria-label='Start chat']",
  INVITE_INPUT: "input[type='text']",
  GO: button("Go"),
  JOIN_ROOM: button("Join the discussion"),
  COMPOSER: "div[contenteditable='true']",
} as const;
