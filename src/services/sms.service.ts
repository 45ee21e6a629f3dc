import logger from '@app/logger';
import { maskPhone } from '@app/utils/mask';
import templateContentMap, { SmsTemplateType } from './sms-templates/sms.types';

export const PHONE_REGEX: RegExp = /^\d{10}$/;

export type OtpPurpose = 'mobile' | 'primary_id' | 'secondary_id';

/**
 * Outbound message channel used by the signup flow.
 */
export interface Notifier {
    sendOtp(phone: string, purpose: OtpPurpose, code: string, ttlSeconds: number): Promise<void>;
    sendAccountOpened(phone: string, holderName: string, accountNumber: string): Promise<void>;
}

/**
 * Delivers a rendered message. The default sender only writes to the log.
 */
export type SmsSender = (phone: string, message: string) => Promise<void>;

const logSender: SmsSender = async (phone, message) => {
    logger.info(`SMS to ${maskPhone(phone)}: ${message}`);
};

const otpTemplates: Record<OtpPurpose, SmsTemplateType> = {
    mobile: SmsTemplateType.SIGNUP_MOBILE_OTP,
    primary_id: SmsTemplateType.PRIMARY_ID_OTP,
    secondary_id: SmsTemplateType.SECONDARY_ID_OTP,
};

/**
 * Service for rendering SMS templates and handing them to a sender
 */
export class SmsService implements Notifier {
    constructor(private readonly sender: SmsSender = logSender) {}

    public async sendOtp(phone: string, purpose: OtpPurpose, code: string, ttlSeconds: number): Promise<void> {
        logger.debug(`Sending ${purpose} OTP SMS to: ${maskPhone(phone)}`);
        await this.sendTemplatedSms(phone, otpTemplates[purpose], [code, String(Math.ceil(ttlSeconds / 60))]);
    }

    public async sendAccountOpened(phone: string, holderName: string, accountNumber: string): Promise<void> {
        await this.sendTemplatedSms(phone, SmsTemplateType.ACCOUNT_SUCCESSFULLY_OPENED, [holderName, accountNumber]);
    }

    /**
     * Send SMS using a template
     * @param phoneNumber Phone number to send to
     * @param templateType Template type to use
     * @param variables Values for each `{#var#}` placeholder, in order
     */
    public async sendTemplatedSms(phoneNumber: string, templateType: SmsTemplateType, variables: string[]): Promise<void> {
        if (!PHONE_REGEX.test(phoneNumber)) {
            throw new Error(`Invalid phone number format for templated SMS: ${maskPhone(phoneNumber)}`);
        }

        const message = this.replaceTemplateVariables(templateContentMap[templateType], variables);
        await this.sender(phoneNumber, message);
    }

    private replaceTemplateVariables(template: string, variables: string[]): string {
        let result = template;
        for (const value of variables) {
            result = result.replace('{#var#}', value);
        }
        return result;
    }
}
