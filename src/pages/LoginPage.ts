import type { LoginLocators } from '../config/locators'
import { createUser } from '../models/user'
import type { User } from '../models/user'
import { isOnPath } from '../support/urls'
import type { BasePage } from './BasePage'

export class LoginPage {
  readonly url: string
  readonly registerUrl: string

  constructor(
    readonly base: BasePage,
    readonly locators: LoginLocators
  ) {
    this.url = base.settings.urls.login
    this.registerUrl = base.settings.urls.register
  }

  async navigate(): Promise<void> {
    await this.base.goto(this.url)
    await this.base.waitForUrl('/login')
  }

  async isLoaded(): Promise<boolean> {
    return (
      (await this.base.appears(this.locators.emailInput)) &&
      (await this.base.isVisible(this.locators.passwordInput)) &&
      (await this.base.isVisible(this.locators.submitButton))
    )
  }

  async fillEmail(email: string): Promise<void> {
    await this.base.fill(this.locators.emailInput, email)
  }

  async fillPassword(password: string): Promise<void> {
    await this.base.fill(this.locators.passwordInput, password)
  }

  async clickSubmit(): Promise<void> {
    await this.base.click(this.locators.submitButton)
  }

  /** Submit the form; with `waitForRedirect` it resolves once the dashboard URL is reached. */
  async login(user: User, waitForRedirect = true): Promise<void> {
    await this.fillEmail(user.email)
    await this.fillPassword(user.password)
    await this.clickSubmit()

    if (waitForRedirect) {
      await this.base.waitForUrl('/dashboard')
    }
  }

  async loginWithCredentials(email: string, password: string, waitForRedirect = true): Promise<void> {
    await this.login(createUser({ email, password, name: '' }), waitForRedirect)
  }

  async isErrorDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.errorMessage)
  }

  async getErrorMessage(): Promise<string | null> {
    if (!(await this.isErrorDisplayed())) return null
    return this.base.getText(this.locators.errorMessage)
  }

  async navigateToRegister(): Promise<void> {
    await this.base.click(this.locators.registerLink)
    await this.base.waitForUrl('/register')
  }

  async navigateToLoginFromRegister(): Promise<void> {
    await this.base.click(this.locators.loginLink)
    await this.base.waitForUrl('/login')
  }

  async openRegister(): Promise<void> {
    await this.base.goto(this.registerUrl)
    await this.base.waitForUrl('/register')
  }

  isOnLoginPage(): boolean {
    return isOnPath(this.base.currentUrl(), '/login')
  }

  async expectLoginPageLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.emailInput)
    await this.base.expectVisible(this.locators.passwordInput)
    await this.base.expectVisible(this.locators.submitButton)
  }

  async expectErrorMessage(): Promise<void> {
    await this.base.expectVisible(this.locators.errorMessage, 5000, 'Login error message should be shown')
  }

  async expectOnLoginPage(): Promise<void> {
    await this.base.expectUrl('/login')
  }

  async expectRegisterFormLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.registerNameInput)
    await this.base.expectVisible(this.locators.emailInput)
    await this.base.expectVisible(this.locators.passwordInput)
    await this.base.expectVisible(this.locators.submitButton)
  }
}
