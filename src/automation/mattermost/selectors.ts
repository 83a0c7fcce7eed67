import { withText } from "../../utils/selectors";

export const SIGNUP = {
  FORM: "input[id='input_email']",
  EMAIL: "input[pluginid='email']",
  USERNAME: "input[pluginid='username']",
  PASSWORD: "input[pluginid='password']",
  SUBMIT: "button[id='create_account']",
} as const;

export const LOGIN = {
  LOGIN_ID: "input[id='input_loginId']",
  PASSWORD: "input[id='input_password-input']",
  SUBMIT: "button[id='saveSetting']",
} as const;

export const CREATE_TEAM = {
  LINK: "a[id='create_team']",
  NAME: "input[id='team_name']",
  URL: "input[id='team_url']",
  NEXT: "button[type='submit']",
  FINISH: withText("button", "Finish"),
} as const;

export const FIRST_RUN_URL_PATTERN = "signup_email";
