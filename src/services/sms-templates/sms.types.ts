export enum SmsTemplateType {
    SIGNUP_MOBILE_OTP = 'SIGNUP_MOBILE_OTP',
    PRIMARY_ID_OTP = 'PRIMARY_ID_OTP',
    SECONDARY_ID_OTP = 'SECONDARY_ID_OTP',
    ACCOUNT_SUCCESSFULLY_OPENED = 'ACCOUNT_SUCCESSFULLY_OPENED',
}

// mapping of SMS template types to their content

const templateContentMap: Record<SmsTemplateType, string> = {
    [SmsTemplateType.SIGNUP_MOBILE_OTP]:
        'Your OTP to verify your mobile number for account opening is {#var#}. Do not share this OTP with anyone. It is valid for {#var#} minutes.',

    [SmsTemplateType.PRIMARY_ID_OTP]:
        'Your OTP for Aadhaar verification is {#var#}. Do not share this OTP with anyone. It is valid for {#var#} minutes.',

    [SmsTemplateType.SECONDARY_ID_OTP]:
        'Your OTP for PAN verification is {#var#}. Do not share this OTP with anyone. It is valid for {#var#} minutes.',

    [SmsTemplateType.ACCOUNT_SUCCESSFULLY_OPENED]:
        'Dear {#var#}, your savings account {#var#} is now open. Log in with your 6 digit PIN.',
};

export default templateContentMap;
